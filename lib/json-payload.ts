import { jsonrepair } from 'jsonrepair';
import type { z } from 'zod';
import { GenerationParseError, errorMessage } from '@/lib/errors';

export type PayloadKind = 'array' | 'object';

const FENCED = /```(?:json|JSON)?\s*([[{][\s\S]*?)\s*```/g;
const BRACKET_SPANS: Record<PayloadKind, RegExp> = {
  array: /\[\s*\{[\s\S]*\}\s*\]/,
  object: /\{[\s\S]*\}/
};

/**
 * JSON candidates inside generator output that may be wrapped in prose or
 * code fences, in the order they are tried: fenced blocks whose body opens
 * with a bracket, then the widest bracket span of the requested kind.
 */
export function jsonCandidates(text: string, kind: PayloadKind): string[] {
  const candidates = [...text.matchAll(FENCED)].map((m) => m[1].trim());
  const span = text.match(BRACKET_SPANS[kind]);
  if (span && !candidates.includes(span[0])) candidates.push(span[0]);
  return candidates;
}

export function extractJsonCandidate(text: string, kind: PayloadKind): string | null {
  return jsonCandidates(text, kind)[0] ?? null;
}

function parseLoose(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    return JSON.parse(jsonrepair(candidate));
  }
}

function readCandidate<T>(text: string, candidate: string, parser: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let json: unknown;
  try {
    json = parseLoose(candidate);
  } catch (err) {
    throw new GenerationParseError(`Generator output is not valid JSON: ${errorMessage(err)}`, text, err);
  }
  const parsed = parser.safeParse(json);
  if (!parsed.success) {
    throw new GenerationParseError(`Generator output has the wrong shape: ${parsed.error.message}`, text, parsed.error);
  }
  return parsed.data;
}

/** The first candidate that parses and fits `parser`; the last candidate's error otherwise. */
export function parseJsonPayload<T>(text: string, kind: PayloadKind, parser: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const candidates = jsonCandidates(text, kind);
  let failure = new GenerationParseError(`No JSON ${kind} found in generator output`, text);
  for (const candidate of candidates) {
    try {
      return readCandidate(text, candidate, parser);
    } catch (err) {
      if (!(err instanceof GenerationParseError)) throw err;
      failure = err;
    }
  }
  throw failure;
}

/** Like `parseJsonPayload`, but logs and returns `fallback()` instead of throwing. */
export function parseJsonPayloadOr<T>(
  text: string,
  kind: PayloadKind,
  parser: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: () => T,
  agent: string
): T {
  try {
    return parseJsonPayload(text, kind, parser);
  } catch (err) {
    console.warn(`[LLM][agent=${agent}] unusable payload, using default`, { message: errorMessage(err) });
    return fallback();
  }
}
