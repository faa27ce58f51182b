/**
 * Narrow interfaces over the chemistry toolkit. The screening core only
 * talks to molecules through these, so any toolkit (or a test fake) can
 * sit behind them. `M` is the toolkit's molecule type, `P` its compiled
 * fragment pattern.
 */

export interface MatchParameters {
  uniquify: boolean; // count each matched atom set once
  maxMatches: number; // stop enumerating at this many matches
  useChirality: boolean;
}

export interface MatchCounter<M, P> {
  /** Throws when the pattern cannot be compiled. */
  compilePattern(source: string): P;
  countMatches(molecule: M, pattern: P, params: MatchParameters): number;
}

/** Whole-molecule facts the fingerprint records beyond fragment counts. */
export interface StructureProbe<M> {
  heavyAtomCount(molecule: M): number;
  ringCount(molecule: M): number;
  hasStereocenter(molecule: M): boolean;
  hasFormalCharge(molecule: M): boolean;
}

export interface IsomorphismOracle<M> {
  isSubstructureMatch(target: M, query: M, options: { useChirality: boolean }): boolean;
  countAllMatches(target: M, query: M, options: { useChirality: boolean }): number;
  canonicalForm(molecule: M, useStereo: boolean): string;
}

export interface MoleculeCodec<M> {
  parse(text: string): M;
  serialize(molecule: M): Uint8Array;
  /** Throws UnparsablePayloadError for bytes it did not write. */
  deserialize(payload: Uint8Array): M;
}

export type ChemistryToolkit<M, P> = MatchCounter<M, P> & StructureProbe<M> & IsomorphismOracle<M> & MoleculeCodec<M>;
