/**
 * Rule Payload Validation Schemas
 *
 * Zod schemas for the matching rules supplied by guide negotiation.
 * Payloads arrive loosely typed (snake_case, with the older field names
 * token_type / detector / min_len / name_token / number_token still in use),
 * so every payload is validated here before the evaluator sees it.
 *
 * A payload that fails validation is skipped, never fatal.
 */

import { z } from 'zod';
import type { RulePayload } from '../contracts/types.js';
import { MalformedRuleError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { getOwn, toRecord } from '../utils/records.js';

/**
 * Wrap a pattern so it must match the whole (stripped) text
 */
export function compileFullMatch(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})$`, 'i');
}

function isCompilablePattern(pattern: string): boolean {
  try {
    compileFullMatch(pattern);
    return true;
  } catch {
    return false;
  }
}

const patternSchema = z
  .string()
  .min(1)
  .refine(isCompilablePattern, { message: 'pattern is not a valid regular expression' });

const roleSchema = z.string().trim().min(1);

export const pairingRelationSchema = z.enum(['below', 'above', 'left', 'right', 'nearest']);

export const tokenDetectorPayloadSchema = z.object({
  kind: z.literal('token_detector'),
  role: roleSchema,
  method: z.enum(['regex', 'length']),
  pattern: patternSchema.optional(),
  min_length: z.number().int().positive().optional(),
});

export const pairingPayloadSchema = z.object({
  kind: z.literal('pairing'),
  name_role: roleSchema.default('room_name'),
  number_role: roleSchema.default('room_number'),
  relation: pairingRelationSchema.default('below'),
  max_distance_px: z.number().positive().optional(),
});

export const excludePayloadSchema = z.object({
  kind: z.literal('exclude'),
  pattern: patternSchema,
  reason: z.string().min(1).optional(),
});

export const rulePayloadSchema = z
  .discriminatedUnion('kind', [tokenDetectorPayloadSchema, pairingPayloadSchema, excludePayloadSchema])
  .superRefine((payload, ctx) => {
    if (payload.kind !== 'token_detector') return;
    if (payload.method === 'regex' && !payload.pattern) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'regex detector requires pattern', path: ['pattern'] });
    }
    if (payload.method === 'length' && payload.min_length === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'length detector requires min_length', path: ['min_length'] });
    }
  });

export type RulePayloadWire = z.input<typeof rulePayloadSchema>;

type WirePayload = Record<string, unknown>;

const FIELD_ALIASES: Readonly<Record<string, string>> = {
  token_type: 'role',
  detector: 'method',
  min_len: 'min_length',
  name_token: 'name_role',
  number_token: 'number_role',
};

function isRecord(value: unknown): value is WirePayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Map older field names onto the current ones. Current names win when both are present.
 * A legacy payload that carries min_len but no detector method is a length detector.
 */
function normalizeWirePayload(raw: WirePayload): WirePayload {
  const fields = new Map<string, unknown>();
  for (const [key, value] of Object.entries(raw)) {
    if (value === null) continue;
    const target = getOwn(FIELD_ALIASES, key) ?? key;
    const current = getOwn(raw, target);
    if (target !== key && current !== undefined && current !== null) continue;
    fields.set(target, value);
  }
  const normalized = toRecord(fields);
  if (normalized.kind === 'token_detector' && normalized.method === undefined && normalized.min_length !== undefined) {
    normalized.method = 'length';
  }
  return normalized;
}

export interface RuleParseOptions {
  /** Used when a pairing payload omits max_distance_px */
  defaultMaxDistancePx: number;
}

export interface RuleParseResult {
  payloads: RulePayload[];
  rejected: MalformedRuleError[];
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate one payload and convert it to the typed variant
 *
 * @throws {MalformedRuleError}
 */
export function parseRulePayload(raw: unknown, index: number, options: RuleParseOptions): RulePayload {
  if (!isRecord(raw)) {
    throw new MalformedRuleError(index, 'payload is not an object');
  }

  const normalized = normalizeWirePayload(raw);
  const parsed = rulePayloadSchema.safeParse(normalized);
  if (!parsed.success) {
    throw new MalformedRuleError(index, formatIssues(parsed.error), { kind: normalized.kind });
  }

  const payload = parsed.data;
  switch (payload.kind) {
    case 'token_detector':
      return {
        kind: 'token_detector',
        role: payload.role,
        method: payload.method,
        pattern: payload.pattern,
        minLength: payload.min_length,
      };
    case 'pairing':
      return {
        kind: 'pairing',
        nameRole: payload.name_role,
        numberRole: payload.number_role,
        relation: payload.relation,
        maxDistancePx: payload.max_distance_px ?? options.defaultMaxDistancePx,
      };
    case 'exclude':
      return {
        kind: 'exclude',
        pattern: payload.pattern,
        reason: payload.reason,
      };
  }
}

/**
 * Validate an ordered list of payloads. Order is preserved for the accepted
 * ones; malformed ones are logged and reported in `rejected`.
 */
export function parseRulePayloads(raw: unknown, options: RuleParseOptions): RuleParseResult {
  if (!Array.isArray(raw)) {
    const error = new MalformedRuleError(-1, 'rule set is not an array');
    logger.warn({ error: error.message }, 'Rule set rejected');
    return { payloads: [], rejected: [error] };
  }

  const payloads: RulePayload[] = [];
  const rejected: MalformedRuleError[] = [];

  raw.forEach((item: unknown, index: number) => {
    try {
      payloads.push(parseRulePayload(item, index, options));
    } catch (error) {
      if (!(error instanceof MalformedRuleError)) {
        throw error;
      }
      rejected.push(error);
      logger.warn({ payloadIndex: index, error: error.message }, 'Skipping malformed rule payload');
    }
  });

  logger.debug({ accepted: payloads.length, rejected: rejected.length }, 'Rule payloads parsed');
  return { payloads, rejected };
}
