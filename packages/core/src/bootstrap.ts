import { createRegistryFromConfig, type BackendFactoryOptions } from '@semantix/backends';
import type { SemantixConfig } from '@semantix/shared';
import { initializeRuntime, SemanticRuntime } from './runtime.js';
import { TiktokenTokenizer, type Tokenizer } from './tokenizer.js';
import { TraceLogger } from './trace-logger.js';

export interface BootstrapOptions extends BackendFactoryOptions {
  tokenizer?: Tokenizer;
}

export function createRuntimeFromConfig(config: SemantixConfig, options: BootstrapOptions = {}): SemanticRuntime {
  return new SemanticRuntime({
    registry: createRegistryFromConfig(config, options),
    tokenizer: options.tokenizer ?? new TiktokenTokenizer(),
    tracer: new TraceLogger({
      level: config.logging.level,
      console: config.logging.traceOutput === 'console',
    }),
    memory: config.memory,
  });
}

/** Build a runtime from configuration and make it the process-wide one. */
export function initializeRuntimeFromConfig(config: SemantixConfig, options: BootstrapOptions = {}): SemanticRuntime {
  return initializeRuntime(createRuntimeFromConfig(config, options));
}
