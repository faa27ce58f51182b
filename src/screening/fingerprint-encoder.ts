import type { MatchCounter, MatchParameters, StructureProbe } from './capabilities';
import type { FragmentLibrary } from './fragment-library';
import { DEFAULT_FRAGMENT_LIBRARY, totalThresholds } from './fragment-library';
import type { Fingerprint } from './fingerprint';
import {
  FLAG_CHARGE,
  FLAG_STEREO,
  FRAGMENT_BIT_COUNT,
  HEAVY_ATOM_SHIFT,
  RING_SHIFT,
  heavyAtomBucket,
  ringCountBucket,
} from './fingerprint';
import { FragmentLibraryBuildError } from 'src/errors';
import { trace } from 'src/utils/verbose';

export interface EncoderOptions {
  library?: FragmentLibrary; // default: version 1 library
}

// Counts above the cap are indistinguishable from the cap itself
export const FRAGMENT_MATCH_PARAMETERS: Readonly<MatchParameters> = Object.freeze({
  uniquify: true,
  maxMatches: 10,
  useChirality: false,
});

export interface FingerprintEncoder<M> {
  readonly library: FragmentLibrary;
  encode(molecule: M): Fingerprint;
}

interface CompiledFragment<P> {
  source: string;
  query: P;
  thresholds: readonly number[];
}

/**
 * Compile every library pattern once and return an encoder bound to them.
 * A pattern that fails to compile aborts construction with
 * FragmentLibraryBuildError; encode() itself never reports library problems.
 */
export function createFingerprintEncoder<M, P>(
  toolkit: MatchCounter<M, P> & StructureProbe<M>,
  options: EncoderOptions = {},
): FingerprintEncoder<M> {
  const library = options.library ?? DEFAULT_FRAGMENT_LIBRARY;
  if (totalThresholds(library.fragments) !== FRAGMENT_BIT_COUNT) {
    throw new FragmentLibraryBuildError(
      `Fragment library defines ${totalThresholds(library.fragments)} thresholds, expected ${FRAGMENT_BIT_COUNT}`,
    );
  }

  const compiled: CompiledFragment<P>[] = library.fragments.map(fragment => {
    try {
      return { source: fragment.pattern, query: toolkit.compilePattern(fragment.pattern), thresholds: fragment.thresholds };
    } catch (error) {
      throw new FragmentLibraryBuildError(
        `Fragment pattern '${fragment.pattern}' failed to compile`,
        { pattern: fragment.pattern },
        error,
      );
    }
  });

  const encode = (molecule: M): Fingerprint => {
    let fp = 0n;
    let bit = 0n;

    for (const fragment of compiled) {
      const count = toolkit.countMatches(molecule, fragment.query, FRAGMENT_MATCH_PARAMETERS);
      trace('encoder', `${fragment.source}: ${count} matches`);
      for (const threshold of fragment.thresholds) {
        if (count >= threshold) fp |= 1n << bit;
        bit++;
      }
    }

    fp |= BigInt(heavyAtomBucket(toolkit.heavyAtomCount(molecule))) << HEAVY_ATOM_SHIFT;
    fp |= BigInt(ringCountBucket(toolkit.ringCount(molecule))) << RING_SHIFT;
    if (toolkit.hasStereocenter(molecule)) fp |= FLAG_STEREO;
    if (toolkit.hasFormalCharge(molecule)) fp |= FLAG_CHARGE;
    return fp;
  };

  return { library, encode };
}
