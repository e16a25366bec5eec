import { MODEL_CONTEXT_WINDOWS, DEFAULT_CONTEXT_WINDOW } from '@semantix/shared';

export function getContextWindow(model: string): number {
  return MODEL_CONTEXT_WINDOWS[model] ?? DEFAULT_CONTEXT_WINDOW;
}

/** Explicit configuration wins over the model table. */
export function resolveMaxTokens(model: string, configured?: number): number {
  return configured ?? getContextWindow(model);
}
