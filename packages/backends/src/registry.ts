import {
  BackendUnavailableError,
  type BackendSettings,
  type CapabilityName,
} from '@semantix/shared';
import type { Backend } from './backend.js';

export interface RegistryChange {
  capability: CapabilityName;
  /** Name of the newly bound backend, or null when unbound */
  backend: string | null;
}

export type RegistryListener = (change: RegistryChange) => void;

/**
 * Capability name → backend handle. Reads are safe from concurrent call
 * chains; writes must be serialised by the host.
 */
export class BackendRegistry {
  private handles = new Map<CapabilityName, Backend>();
  private listeners: RegistryListener[] = [];

  /** Bind one capability. Replaces any previous binding for later dispatches. */
  configure(capability: CapabilityName, backend: Backend): void {
    this.handles.set(capability, backend);
    this.emit({ capability, backend: backend.name });
  }

  /** Bind every capability the backend declares. */
  register(backend: Backend): void {
    for (const capability of backend.capabilities) {
      this.configure(capability, backend);
    }
  }

  /** Bind several capabilities at once. */
  setup(handles: Record<string, Backend>): void {
    for (const [capability, backend] of Object.entries(handles)) {
      this.configure(capability, backend);
    }
  }

  resolve(capability: CapabilityName): Backend {
    const backend = this.handles.get(capability);
    if (!backend) throw new BackendUnavailableError(capability);
    return backend;
  }

  get(capability: CapabilityName): Backend | undefined {
    return this.handles.get(capability);
  }

  has(capability: CapabilityName): boolean {
    return this.handles.has(capability);
  }

  unregister(capability: CapabilityName): boolean {
    const removed = this.handles.delete(capability);
    if (removed) this.emit({ capability, backend: null });
    return removed;
  }

  listCapabilities(): CapabilityName[] {
    return Array.from(this.handles.keys());
  }

  /** Distinct backends, in first-bound order. */
  listBackends(): Backend[] {
    return Array.from(new Set(this.handles.values()));
  }

  /**
   * Send runtime settings to the backends behind the named capabilities.
   * A backend bound to several of them receives the settings once.
   */
  command(target: CapabilityName[] | 'all', settings: BackendSettings): void {
    const backends = target === 'all'
      ? this.listBackends()
      : Array.from(new Set(target.map(capability => this.resolve(capability))));

    for (const backend of backends) {
      backend.command(settings);
    }
  }

  onChange(listener: RegistryListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private emit(change: RegistryChange): void {
    for (const listener of this.listeners) listener(change);
  }
}
