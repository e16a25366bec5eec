import { z } from 'zod';
import {
  SemantixError,
  vectorMatchSchema,
  type OperationKind,
  type Overrides,
  type VectorMatch,
} from '@semantix/shared';
import type { SemanticValue } from './value.js';

export interface DispatchRequest {
  operation: OperationKind;
  subject: SemanticValue;
  operands: SemanticValue[];
  overrides: Overrides;
  /** String forms of the subject followed by each operand */
  args: string[];
}

/** Contributes a piece of the live query. Pieces are concatenated in order. */
export type PreProcessor = (request: DispatchRequest) => string | undefined;

/** Transforms the reply; each one receives the previous one's output. */
export type PostProcessor = (reply: unknown, request: DispatchRequest) => unknown;

export function template(render: (args: string[]) => string): PreProcessor {
  return request => render(request.args);
}

// ── Post-processors ──────────────────────────────────────────────

export const strip: PostProcessor = reply => (typeof reply === 'string' ? reply.trim() : reply);

const TRUTHY = new Set(['true', 'yes', '1']);

export const parseBoolean: PostProcessor = reply => {
  if (typeof reply === 'boolean') return reply;
  return TRUTHY.has(String(reply).trim().toLowerCase().replace(/[.!]+$/, ''));
};

/**
 * JSON arrays are taken as-is; anything else is one item per line with
 * list bullets removed.
 */
export const parseList: PostProcessor = reply => {
  if (Array.isArray(reply)) return reply;
  const text = String(reply).trim();
  if (text.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(text);
      if (Array.isArray(parsed)) return parsed;
    } catch {
      // Not JSON; fall through to line splitting
    }
  }
  return text
    .split('\n')
    .map(line => line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').trim())
    .filter(line => line.length > 0);
};

const vectorsSchema = z.array(z.array(z.number()));

export const parseVectors: PostProcessor = reply => {
  const parsed = vectorsSchema.safeParse(reply);
  if (!parsed.success) throw new SemantixError('Malformed embedding reply: expected a list of vectors');
  return parsed.data;
};

const matchesSchema = z.array(vectorMatchSchema);

export const parseMatches: PostProcessor = (reply): VectorMatch[] => {
  const parsed = matchesSchema.safeParse(reply);
  if (!parsed.success) throw new SemantixError('Malformed index reply: expected a list of matches');
  return parsed.data;
};

export const expectBoolean: PostProcessor = reply => {
  if (typeof reply !== 'boolean') throw new SemantixError('Malformed index reply: expected a boolean');
  return reply;
};

export const expectCount: PostProcessor = reply => {
  if (typeof reply !== 'number') throw new SemantixError('Malformed index reply: expected a count');
  return reply;
};
