import type { IsomorphismOracle, MoleculeCodec } from './capabilities';
import { BinaryRecord } from './binary-record';
import { explainScreen } from './containment-screen';
import { trace } from 'src/utils/verbose';

/** A fingerprinted record, or a bare molecule payload that is never screened. */
export type MoleculeOperand = BinaryRecord | Uint8Array;

export interface ComparatorOptions {
  useStereo?: boolean; // honour tetrahedral stereo in exact and substructure checks (default false)
}

export interface Comparator {
  isExactMatch(a: MoleculeOperand, b: MoleculeOperand): boolean;
  isSubstructure(target: MoleculeOperand, query: MoleculeOperand): boolean;
  substructCount(target: MoleculeOperand, query: MoleculeOperand): number;
  /** Fingerprint screen alone; true when either side has no fingerprint. */
  passesScreen(target: MoleculeOperand, query: MoleculeOperand): boolean;
}

function payloadOf(operand: MoleculeOperand): Uint8Array {
  return operand instanceof BinaryRecord ? operand.payload : operand;
}

export function createComparator<M>(
  toolkit: IsomorphismOracle<M> & Pick<MoleculeCodec<M>, 'deserialize'>,
  options: ComparatorOptions = {},
): Comparator {
  const useStereo = options.useStereo ?? false;
  const matchOptions = { useChirality: useStereo };

  const load = (operand: MoleculeOperand): M => toolkit.deserialize(payloadOf(operand));

  const passesScreen = (target: MoleculeOperand, query: MoleculeOperand): boolean => {
    if (!(target instanceof BinaryRecord) || !(query instanceof BinaryRecord)) return true;
    const failure = explainScreen(target.fingerprint, query.fingerprint);
    if (failure !== null) {
      trace('comparator', `screen rejected query on ${failure}`);
      return false;
    }
    return true;
  };

  /**
   * Mutual substructure match, then canonical form equality. Two forms
   * that only differ in ways the graph match cannot see (stereo, charge
   * placement) still count as different molecules.
   */
  const isExactMatch = (a: MoleculeOperand, b: MoleculeOperand): boolean => {
    if (a instanceof BinaryRecord && b instanceof BinaryRecord && !a.samePrefix(b)) {
      trace('comparator', 'exact match ruled out by fingerprint prefix');
      return false;
    }

    const left = load(a);
    const right = load(b);
    const leftInRight = toolkit.isSubstructureMatch(left, right, matchOptions);
    const rightInLeft = toolkit.isSubstructureMatch(right, left, matchOptions);
    if (leftInRight !== rightInLeft) return false;

    return toolkit.canonicalForm(left, useStereo) === toolkit.canonicalForm(right, useStereo);
  };

  const isSubstructure = (target: MoleculeOperand, query: MoleculeOperand): boolean => {
    if (!passesScreen(target, query)) return false;
    return toolkit.isSubstructureMatch(load(target), load(query), matchOptions);
  };

  const substructCount = (target: MoleculeOperand, query: MoleculeOperand): number => {
    if (!passesScreen(target, query)) return 0;
    return toolkit.countAllMatches(load(target), load(query), matchOptions);
  };

  return { isExactMatch, isSubstructure, substructCount, passesScreen };
}
