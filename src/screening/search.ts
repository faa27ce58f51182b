import type { IsomorphismOracle, MoleculeCodec } from './capabilities';
import type { ComparatorOptions, MoleculeOperand } from './comparator';
import { BinaryRecord } from './binary-record';
import { mightContain } from './containment-screen';
import { trace } from 'src/utils/verbose';

export interface SearchStats {
  candidates: number;
  screenedOut: number; // rejected by the fingerprint alone
  verified: number; // sent to the isomorphism check
  matched: number;
}

export interface SearchResult {
  matches: number[]; // indices into the searched collection, ascending
  stats: SearchStats;
}

/**
 * Screen-then-verify substructure search over a collection. The query is
 * decoded once; a target is only decoded when its fingerprint passes.
 */
export function searchSubstructure<M>(
  toolkit: IsomorphismOracle<M> & Pick<MoleculeCodec<M>, 'deserialize'>,
  targets: readonly MoleculeOperand[],
  query: MoleculeOperand,
  options: ComparatorOptions = {},
): SearchResult {
  const matchOptions = { useChirality: options.useStereo ?? false };
  const queryFingerprint = query instanceof BinaryRecord ? query.fingerprint : null;
  let queryMolecule: M | undefined;

  const stats: SearchStats = { candidates: targets.length, screenedOut: 0, verified: 0, matched: 0 };
  const matches: number[] = [];

  targets.forEach((target, index) => {
    if (queryFingerprint !== null && target instanceof BinaryRecord && !mightContain(target.fingerprint, queryFingerprint)) {
      stats.screenedOut++;
      return;
    }

    queryMolecule ??= toolkit.deserialize(query instanceof BinaryRecord ? query.payload : query);
    const targetMolecule = toolkit.deserialize(target instanceof BinaryRecord ? target.payload : target);
    stats.verified++;
    if (toolkit.isSubstructureMatch(targetMolecule, queryMolecule, matchOptions)) {
      stats.matched++;
      matches.push(index);
    }
  });

  trace('search', `${stats.candidates} candidates, ${stats.screenedOut} screened out, ${stats.matched} matched`);
  return { matches, stats };
}
