import { BackendRegistry, type Backend } from '@semantix/backends';
import { DEFAULT_CONFIG, type BackendSettings, type CapabilityName, type MemoryConfig } from '@semantix/shared';
import { ContextRegistry } from './context-registry.js';
import { Dispatcher } from './dispatcher.js';
import { TiktokenTokenizer, type Tokenizer } from './tokenizer.js';
import { TraceLogger } from './trace-logger.js';

export interface RuntimeOptions {
  registry?: BackendRegistry;
  contexts?: ContextRegistry;
  tokenizer?: Tokenizer;
  tracer?: TraceLogger;
  /** Defaults for memories built without explicit sizes */
  memory?: Partial<MemoryConfig>;
}

/**
 * The collaborators every value dispatches through: the capability registry,
 * the run-time context table, the tokenizer and the trace logger.
 */
export class SemanticRuntime {
  readonly registry: BackendRegistry;
  readonly contexts: ContextRegistry;
  readonly tokenizer: Tokenizer;
  readonly tracer: TraceLogger;
  readonly dispatcher: Dispatcher;
  readonly memory: MemoryConfig;

  constructor(options: RuntimeOptions = {}) {
    this.registry = options.registry ?? new BackendRegistry();
    this.contexts = options.contexts ?? new ContextRegistry();
    this.tokenizer = options.tokenizer ?? new TiktokenTokenizer();
    this.tracer = options.tracer ?? new TraceLogger();
    this.dispatcher = new Dispatcher(this.registry, this.tracer);
    this.memory = { ...DEFAULT_CONFIG.memory, ...options.memory };

    this.registry.onChange(change => {
      this.tracer.notice('registry_change', { capability: change.capability, backend: change.backend });
    });
  }

  configure(capability: CapabilityName, backend: Backend): void {
    this.registry.configure(capability, backend);
  }

  setup(handles: Record<string, Backend>): void {
    this.registry.setup(handles);
  }

  command(target: CapabilityName[] | 'all', settings: BackendSettings): void {
    this.registry.command(target, settings);
  }
}

let instance: SemanticRuntime | null = null;

/** Replace the process-wide runtime. */
export function initializeRuntime(options?: RuntimeOptions | SemanticRuntime): SemanticRuntime {
  instance = options instanceof SemanticRuntime ? options : new SemanticRuntime(options);
  return instance;
}

/** The process-wide runtime, created empty on first use. */
export function getRuntime(): SemanticRuntime {
  instance ??= new SemanticRuntime();
  return instance;
}

export function resetRuntime(): void {
  instance = null;
}
