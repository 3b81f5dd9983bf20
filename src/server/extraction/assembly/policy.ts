/**
 * Extraction policies
 *
 * CONSERVATIVE runs on a fully validated rule set, RELAXED on provisional
 * rules only. Matching and thresholds are identical; the policy only shows up
 * as provenance on the objects built from rules.
 */

import type { ExtractionPolicy } from '../../contracts/types.js';

export const RELAXED_POLICY_SOURCES: readonly string[] = ['extraction_policy:relaxed', 'guide_source:provisional'];

export function withPolicySources(sources: readonly string[], policy: ExtractionPolicy): string[] {
  return policy === 'relaxed' ? [...sources, ...RELAXED_POLICY_SOURCES] : [...sources];
}
