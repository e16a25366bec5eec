import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  Capability,
  OperationKind,
  SemantixError,
  type BackendInput,
  type CapabilityName,
  type CompareOperator,
  type IndexCommand,
  type LogicOperator,
} from '@semantix/shared';
import {
  expectBoolean,
  expectCount,
  parseBoolean,
  parseList,
  parseMatches,
  parseVectors,
  strip,
  template,
  type DispatchRequest,
  type PostProcessor,
  type PreProcessor,
} from './processors.js';
import type { SemanticValue } from './value.js';

/**
 * Everything `dispatch` needs to know about one operation. Fields left out
 * fall back to the operation table entry for `kind`.
 */
export interface Operation {
  kind: OperationKind;
  capability?: CapabilityName;
  instruction?: string;
  examples?: string[];
  preProcessors?: PreProcessor[];
  postProcessors?: PostProcessor[];
  stop?: string[];
  /** Class wrapping the result. Defaults to the subject's return class */
  returns?: typeof SemanticValue;
  /** Builds a non-prompt backend input. Prompt input when absent */
  encode?: (request: DispatchRequest, prompt: string) => BackendInput;
}

export interface ResolvedOperation {
  kind: OperationKind;
  capability: CapabilityName;
  instruction: string;
  examples: string[];
  preProcessors: PreProcessor[];
  postProcessors: PostProcessor[];
  stop: string[];
  returns?: typeof SemanticValue;
  encode?: (request: DispatchRequest, prompt: string) => BackendInput;
}

type TableEntry = Omit<ResolvedOperation, 'kind' | 'returns'>;

const promptTableSchema = z.record(
  z.object({
    instruction: z.string(),
    examples: z.array(z.string()),
  }),
);

const PROMPTS = promptTableSchema.parse(
  JSON.parse(readFileSync(new URL('./prompts.json', import.meta.url), 'utf-8')),
);

function prompted(kind: OperationKind, pre: PreProcessor, post: PostProcessor[] = [strip]): TableEntry {
  const entry = PROMPTS[kind];
  return {
    capability: Capability.Reasoning,
    instruction: entry?.instruction ?? '',
    examples: entry?.examples ?? [],
    preProcessors: [pre],
    postProcessors: post,
    stop: [],
  };
}

const binary = (symbol: string) => template(([a, b]) => `${a} ${symbol} ${b} =>`);

const OPERATION_TABLE: Record<OperationKind, TableEntry> = {
  [OperationKind.Equals]: prompted(OperationKind.Equals, binary('=='), [strip, parseBoolean]),
  [OperationKind.Contains]: prompted(
    OperationKind.Contains,
    template(([a, b]) => `${b} in ${a} =>`),
    [strip, parseBoolean],
  ),
  [OperationKind.IsInstanceOf]: prompted(OperationKind.IsInstanceOf, binary('isinstanceof'), [strip, parseBoolean]),
  [OperationKind.Compare]: prompted(OperationKind.Compare, binary('>'), [strip, parseBoolean]),
  [OperationKind.GetItem]: prompted(OperationKind.GetItem, template(([a, key]) => `${a}[${key}] =>`)),
  [OperationKind.SetItem]: prompted(
    OperationKind.SetItem,
    template(([a, key, value]) => `${a}[${key}] = ${value} =>`),
  ),
  [OperationKind.DeleteItem]: prompted(OperationKind.DeleteItem, template(([a, key]) => `del ${a}[${key}] =>`)),
  [OperationKind.Negate]: prompted(OperationKind.Negate, template(([a]) => `not ${a} =>`)),
  [OperationKind.Invert]: prompted(OperationKind.Invert, template(([a]) => `~${a} =>`)),
  [OperationKind.Include]: prompted(OperationKind.Include, binary('<<')),
  [OperationKind.Combine]: prompted(OperationKind.Combine, binary('+')),
  [OperationKind.Replace]: prompted(
    OperationKind.Replace,
    template(([text, target, replacement]) => `replace ${target} with ${replacement} in ${text} =>`),
  ),
  [OperationKind.Logic]: prompted(OperationKind.Logic, binary('and')),
  [OperationKind.Query]: prompted(
    OperationKind.Query,
    template(([context, question]) => `Context: ${context}\nQuestion: ${question} =>`),
  ),
  [OperationKind.List]: prompted(
    OperationKind.List,
    template(([a, criteria]) => `list ${criteria} in ${a} =>`),
    [strip, parseList],
  ),
  [OperationKind.Embed]: {
    capability: Capability.Embedding,
    instruction: '',
    examples: [],
    preProcessors: [],
    postProcessors: [parseVectors],
    stop: [],
    encode: request => ({ kind: 'embed', texts: request.subject.textItems() }),
  },
  [OperationKind.Index]: {
    capability: Capability.Indexing,
    instruction: '',
    examples: [],
    preProcessors: [],
    postProcessors: [],
    stop: [],
    encode: () => {
      throw new SemantixError('Index operations need a command; build one with indexOperation()');
    },
  },
};

export function resolveOperation(operation: Operation): ResolvedOperation {
  const base = OPERATION_TABLE[operation.kind];
  return {
    kind: operation.kind,
    capability: operation.capability ?? base.capability,
    instruction: operation.instruction ?? base.instruction,
    examples: operation.examples ?? base.examples,
    preProcessors: operation.preProcessors ?? base.preProcessors,
    postProcessors: operation.postProcessors ?? base.postProcessors,
    stop: operation.stop ?? base.stop,
    returns: operation.returns,
    encode: operation.encode ?? base.encode,
  };
}

// ── Builders ─────────────────────────────────────────────────────

export function compareOperation(operator: CompareOperator): Operation {
  return { kind: OperationKind.Compare, preProcessors: [binary(operator)] };
}

export function logicOperation(operator: LogicOperator): Operation {
  return { kind: OperationKind.Logic, preProcessors: [binary(operator)] };
}

const INDEX_REPLIES: Record<IndexCommand['op'], PostProcessor> = {
  register: expectBoolean,
  exists: expectBoolean,
  drop: expectBoolean,
  upsert: expectCount,
  query: parseMatches,
};

export function indexOperation(command: IndexCommand): Operation {
  return {
    kind: OperationKind.Index,
    postProcessors: [INDEX_REPLIES[command.op]],
    encode: () => ({ kind: 'index', command }),
  };
}
