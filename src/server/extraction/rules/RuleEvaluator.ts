/**
 * Rule Evaluator
 *
 * Executes the externally supplied rule payloads against token text. Holds no
 * vocabulary of its own: every role, pattern and threshold comes from the
 * payloads, which are evaluated in the order they were supplied.
 */

import type {
  DetectorMethod,
  ExcludePayload,
  PairingPayload,
  RulePayload,
  TokenDetectorPayload,
} from '../../contracts/types.js';
import { MalformedRuleError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { compileFullMatch } from '../../validation/rulePayloadSchemas.js';

export const DEFAULT_EXCLUDE_REASON = 'excluded_by_pattern';

/**
 * Roles such as `room_name` or `name` hold words, not codes; the length
 * method additionally requires their text to be uppercase letters only.
 */
export function isNameRole(role: string): boolean {
  return /(^|_)name$/i.test(role);
}

/**
 * Uppercase letters only, at least one letter
 */
function isUppercaseAlphabetic(text: string): boolean {
  return /^\p{L}+$/u.test(text) && text === text.toUpperCase() && text !== text.toLowerCase();
}

interface CompiledDetector {
  role: string;
  method: DetectorMethod;
  matches(text: string): boolean;
}

interface CompiledExclude {
  reason: string;
  regex: RegExp;
}

function compileDetector(payload: TokenDetectorPayload, index: number): CompiledDetector {
  if (payload.method === 'regex') {
    if (!payload.pattern) {
      throw new MalformedRuleError(index, 'regex detector requires pattern');
    }
    const regex = compileFullMatch(payload.pattern);
    return { role: payload.role, method: payload.method, matches: (text) => regex.test(text) };
  }

  const minLength = payload.minLength;
  if (minLength === undefined || minLength < 1) {
    throw new MalformedRuleError(index, 'length detector requires min_length');
  }
  const nameRole = isNameRole(payload.role);
  return {
    role: payload.role,
    method: payload.method,
    matches: (text) => text.length >= minLength && (!nameRole || isUppercaseAlphabetic(text)),
  };
}

function compileExclude(payload: ExcludePayload, index: number): CompiledExclude {
  if (!payload.pattern) {
    throw new MalformedRuleError(index, 'exclude rule requires pattern');
  }
  return { reason: payload.reason || DEFAULT_EXCLUDE_REASON, regex: compileFullMatch(payload.pattern) };
}

export class RuleEvaluator {
  private readonly detectors: CompiledDetector[] = [];
  private readonly excludes: CompiledExclude[] = [];
  /** Last pairing payload in the list */
  readonly pairing?: PairingPayload;
  readonly skipped: MalformedRuleError[] = [];

  constructor(payloads: readonly RulePayload[]) {
    let pairing: PairingPayload | undefined;

    payloads.forEach((payload, index) => {
      try {
        switch (payload.kind) {
          case 'token_detector':
            this.detectors.push(compileDetector(payload, index));
            break;
          case 'exclude':
            this.excludes.push(compileExclude(payload, index));
            break;
          case 'pairing':
            pairing = payload;
            break;
        }
      } catch (error) {
        const malformed =
          error instanceof MalformedRuleError
            ? error
            : new MalformedRuleError(index, error instanceof Error ? error.message : String(error));
        this.skipped.push(malformed);
        logger.warn({ payloadIndex: index, kind: payload.kind, error: malformed.message }, 'Skipping malformed rule payload');
      }
    });

    this.pairing = pairing;
  }

  get hasDetectors(): boolean {
    return this.detectors.length > 0;
  }

  /**
   * Roles that at least one detector can assign
   */
  get roles(): string[] {
    return [...new Set(this.detectors.map((detector) => detector.role))];
  }

  /**
   * Role of the first detector matching the stripped text
   */
  classify(text: string): string | undefined {
    const stripped = text.trim();
    if (!stripped) return undefined;
    return this.detectors.find((detector) => detector.matches(stripped))?.role;
  }

  /**
   * Reason of the first exclude rule fully matching the stripped text
   */
  exclusionReason(text: string): string | undefined {
    const stripped = text.trim();
    return this.excludes.find((rule) => rule.regex.test(stripped))?.reason;
  }
}
