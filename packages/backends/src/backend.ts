import type {
  BackendInput,
  BackendProperties,
  BackendReply,
  BackendSettings,
  CapabilityName,
  InvokeOptions,
} from '@semantix/shared';

export abstract class Backend {
  abstract readonly name: string;
  abstract readonly capabilities: CapabilityName[];

  /**
   * One call to the external service. Implementations wrap transport and API
   * failures in `BackendError`; there is no retry at this level.
   */
  abstract invoke(input: BackendInput, options: InvokeOptions): Promise<BackendReply>;

  /** Read-only facts about the bound model, e.g. its context window. */
  abstract properties(): BackendProperties;

  /** Apply runtime settings. Takes effect for subsequent calls only. */
  abstract command(settings: BackendSettings): void;
}
