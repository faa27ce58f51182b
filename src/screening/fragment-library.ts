import libraryData from './data/fragment-library.v1.json';
import { FRAGMENT_BIT_COUNT } from './fingerprint';
import { FragmentLibraryBuildError } from 'src/errors';

/**
 * Match-count threshold. A count meets it when `count >= threshold`.
 * Thresholds are positive integers; both sides of the comparison are
 * non-negative counts.
 */
export type Threshold = number;

export interface FragmentPattern {
  readonly pattern: string;
  readonly thresholds: readonly Threshold[];
}

/**
 * Ordered fragment catalog. Pattern order and threshold order fix the
 * fingerprint bit layout: threshold k of pattern i owns bit
 * (sum of thresholds before i) + k.
 */
export interface FragmentLibrary {
  readonly version: number;
  readonly fragments: readonly FragmentPattern[];
}

interface RawLibrary {
  version: unknown;
  fragments: unknown;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validate and freeze a fragment library. The threshold total must equal
 * the 55 fragment bits of the fingerprint.
 */
export function defineFragmentLibrary(raw: RawLibrary): FragmentLibrary {
  if (!isPositiveInteger(raw.version)) {
    throw new FragmentLibraryBuildError(`Fragment library version must be a positive integer, got ${String(raw.version)}`);
  }
  if (!Array.isArray(raw.fragments)) {
    throw new FragmentLibraryBuildError('Fragment library has no fragment list');
  }

  const fragments: FragmentPattern[] = [];
  for (const entry of raw.fragments) {
    if (typeof entry !== 'object' || entry === null) {
      throw new FragmentLibraryBuildError('Fragment library entry is not an object');
    }
    const pattern: unknown = Reflect.get(entry, 'pattern');
    const thresholds: unknown = Reflect.get(entry, 'thresholds');
    if (typeof pattern !== 'string' || pattern === '') {
      throw new FragmentLibraryBuildError('Fragment library entry has no pattern');
    }
    if (!Array.isArray(thresholds) || thresholds.length === 0 || !thresholds.every(isPositiveInteger)) {
      throw new FragmentLibraryBuildError(`Fragment '${pattern}' needs a non-empty list of positive integer thresholds`, { pattern });
    }
    fragments.push(Object.freeze({ pattern, thresholds: Object.freeze([...thresholds]) }));
  }

  const total = totalThresholds(fragments);
  if (total !== FRAGMENT_BIT_COUNT) {
    throw new FragmentLibraryBuildError(
      `Fragment library defines ${total} thresholds, the fingerprint has ${FRAGMENT_BIT_COUNT} fragment bits`,
      { total },
    );
  }

  return Object.freeze({ version: raw.version, fragments: Object.freeze(fragments) });
}

export function totalThresholds(fragments: readonly FragmentPattern[]): number {
  return fragments.reduce((sum, fragment) => sum + fragment.thresholds.length, 0);
}

/** First fingerprint bit owned by each fragment. */
export function fragmentBitOffsets(library: FragmentLibrary): number[] {
  const offsets: number[] = [];
  let next = 0;
  for (const fragment of library.fragments) {
    offsets.push(next);
    next += fragment.thresholds.length;
  }
  return offsets;
}

export const DEFAULT_FRAGMENT_LIBRARY: FragmentLibrary = defineFragmentLibrary(libraryData);
