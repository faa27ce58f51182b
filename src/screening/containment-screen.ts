import type { Fingerprint } from './fingerprint';
import {
  FRAGMENT_MASK,
  getHeavyAtomBucket,
  getRingBucket,
  hasChargeFlag,
  hasStereoFlag,
} from './fingerprint';

export type ScreenFailure = 'size' | 'rings' | 'stereo' | 'charge' | 'fragments';

/**
 * First check that proves `query` cannot be a substructure of `target`,
 * or null when every check passes.
 */
export function explainScreen(target: Fingerprint, query: Fingerprint): ScreenFailure | null {
  if (getHeavyAtomBucket(target) < getHeavyAtomBucket(query)) return 'size';
  if (getRingBucket(target) < getRingBucket(query)) return 'rings';
  if (hasStereoFlag(query) && !hasStereoFlag(target)) return 'stereo';
  if (hasChargeFlag(query) && !hasChargeFlag(target)) return 'charge';
  const queryFragments = query & FRAGMENT_MASK;
  if ((target & queryFragments) !== queryFragments) return 'fragments';
  return null;
}

/**
 * Could `target` contain `query`? False is definitive; true still needs
 * an exact isomorphism check.
 */
export function mightContain(target: Fingerprint, query: Fingerprint): boolean {
  return explainScreen(target, query) === null;
}
