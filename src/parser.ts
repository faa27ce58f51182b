import type { Atom, Bond, Molecule, ParseResult, ParseError } from 'types';
import { BondType, StereoType, IMPLICIT_HYDROGEN } from 'types';
import { AROMATIC_VALENCES, DEFAULT_VALENCES } from './constants';
import { createAtom } from './utils/atom-utils';
import { bondKey, bondOrder } from './utils/bond-utils';
import { parseBracketAtom } from './parsers/bracket-parser';
import { enrichMolecule } from './utils/molecule-enrichment';
import { perceiveAromaticity } from './utils/aromaticity-perceiver';
import { MoleculeParseError } from './errors';

export interface ParseOptions {
  /**
   * Run aromaticity perception and stereo cleanup (default true).
   * Fragment patterns are read with this off so aromatic atoms written
   * outside a ring keep their aromatic bonds.
   */
  sanitize?: boolean;
}

interface NeighborSlot {
  atomId: number | null;
}

interface OpenRing {
  atomId: number;
  bondType: BondType;
  bondStereo: StereoType;
  explicit: boolean;
  slot: NeighborSlot;
  position: number;
}

/**
 * Parse a SMILES string into a single molecule graph.
 * Dot-separated components stay in the same graph. Errors are collected,
 * not thrown; use parseMolecule for the strict variant.
 */
export function parseSMILES(smiles: string, options: ParseOptions = {}): ParseResult {
  const sanitize = options.sanitize ?? true;
  const errors: ParseError[] = [];
  const atoms: Atom[] = [];
  const bonds: Bond[] = [];
  const explicitBonds = new Set<string>();
  const neighborOrder = new Map<number, NeighborSlot[]>();

  const slotsOf = (atomId: number): NeighborSlot[] => {
    const slots = neighborOrder.get(atomId) ?? [];
    neighborOrder.set(atomId, slots);
    return slots;
  };

  const connect = (from: number, to: number, type: BondType, stereo: StereoType, explicit: boolean) => {
    bonds.push({ atom1: from, atom2: to, type, stereo });
    if (explicit) explicitBonds.add(bondKey(from, to));
    slotsOf(from).push({ atomId: to });
    slotsOf(to).push({ atomId: from });
  };

  let i = 0;
  let prevAtomId: number | null = null;
  let pendingBondType = BondType.SINGLE;
  let pendingBondStereo = StereoType.NONE;
  let pendingBondExplicit = false;
  const branchStack: number[] = [];
  const openRings = new Map<number, OpenRing>();

  const resetPendingBond = () => {
    pendingBondType = BondType.SINGLE;
    pendingBondStereo = StereoType.NONE;
    pendingBondExplicit = false;
  };

  const addAtom = (atom: Atom) => {
    atoms.push(atom);
    if (prevAtomId !== null) {
      connect(prevAtomId, atom.id, pendingBondType, pendingBondStereo, pendingBondExplicit);
    } else if (pendingBondExplicit) {
      errors.push({ message: 'Bond symbol without a preceding atom', position: i });
    }
    if (atom.chiral && atom.hydrogens > 0) {
      slotsOf(atom.id).push({ atomId: IMPLICIT_HYDROGEN });
    }
    prevAtomId = atom.id;
    resetPendingBond();
  };

  const closeRing = (digit: number, position: number) => {
    if (prevAtomId === null) {
      errors.push({ message: 'Ring closure digit without previous atom', position });
      return;
    }
    const opening = openRings.get(digit);
    if (!opening) {
      const slot: NeighborSlot = { atomId: null };
      slotsOf(prevAtomId).push(slot);
      openRings.set(digit, {
        atomId: prevAtomId,
        bondType: pendingBondType,
        bondStereo: pendingBondStereo,
        explicit: pendingBondExplicit,
        slot,
        position,
      });
      resetPendingBond();
      return;
    }

    openRings.delete(digit);
    if (opening.atomId === prevAtomId) {
      errors.push({ message: `Ring closure ${digit} bonds an atom to itself`, position });
      resetPendingBond();
      return;
    }
    const ringBondKey = bondKey(opening.atomId, prevAtomId);
    if (bonds.some(b => bondKey(b.atom1, b.atom2) === ringBondKey)) {
      errors.push({ message: `Ring closure ${digit} duplicates an existing bond`, position });
      resetPendingBond();
      return;
    }
    if (opening.explicit && pendingBondExplicit && opening.bondType !== pendingBondType) {
      errors.push({ message: `Ring closure ${digit} has conflicting bond types`, position });
    }

    const useOpening = opening.explicit && !(pendingBondExplicit && pendingBondType !== BondType.SINGLE);
    const bondType = useOpening ? opening.bondType : pendingBondType;
    const bondStereo = pendingBondStereo !== StereoType.NONE ? pendingBondStereo : opening.bondStereo;
    const explicit = opening.explicit || pendingBondExplicit;

    bonds.push({ atom1: opening.atomId, atom2: prevAtomId, type: bondType, stereo: bondStereo });
    if (explicit) explicitBonds.add(bondKey(opening.atomId, prevAtomId));
    opening.slot.atomId = prevAtomId;
    slotsOf(prevAtomId).push({ atomId: opening.atomId });
    resetPendingBond();
  };

  if (smiles.trim() === '') {
    errors.push({ message: 'Empty SMILES', position: 0 });
  }

  while (i < smiles.length) {
    const ch = smiles.charAt(i);

    if (ch === ' ' || ch === '\t' || ch === '\n') {
      i++;
      continue;
    }

    // Bracket atoms like [NH4+]
    if (ch === '[') {
      const close = smiles.indexOf(']', i + 1);
      if (close === -1) {
        errors.push({ message: 'Unclosed bracket', position: i });
        break;
      }
      const content = smiles.slice(i + 1, close);
      const atom = parseBracketAtom(content, atoms.length);
      if (!atom) {
        errors.push({ message: `Invalid bracket atom: ${content}`, position: i });
      } else {
        addAtom(atom);
      }
      i = close + 1;
      continue;
    }

    // Wildcard atom '*'
    if (ch === '*') {
      const atom = createAtom('*', atoms.length);
      if (atom) addAtom(atom);
      i++;
      continue;
    }

    // Organic subset atoms; Cl and Br are the only two-letter symbols outside brackets
    if (/[A-Za-z]/.test(ch)) {
      let symbol = ch;
      const next = smiles.charAt(i + 1);
      if ((ch === 'C' && next === 'l') || (ch === 'B' && next === 'r')) {
        symbol = ch + next;
      }
      const aromatic = /^[bcnosp]$/.test(symbol);
      const organic = aromatic || /^(B|C|N|O|P|S|F|Cl|Br|I)$/.test(symbol);
      const atom = organic ? createAtom(symbol, atoms.length, aromatic) : null;
      if (!atom) {
        errors.push({ message: `Unsupported character: ${ch}`, position: i });
        i++;
        continue;
      }
      addAtom(atom);
      i += symbol.length;
      continue;
    }

    // Bonds
    const bondSymbol = BOND_SYMBOLS[ch];
    if (bondSymbol) {
      pendingBondType = bondSymbol.type;
      if (bondSymbol.stereo !== StereoType.NONE) pendingBondStereo = bondSymbol.stereo;
      pendingBondExplicit = true;
      i++;
      continue;
    }

    // Branching
    if (ch === '(') {
      if (prevAtomId === null) {
        errors.push({ message: 'Branch without a preceding atom', position: i });
      } else {
        branchStack.push(prevAtomId);
      }
      i++;
      continue;
    }
    if (ch === ')') {
      const branchPoint = branchStack.pop();
      if (branchPoint === undefined) {
        errors.push({ message: 'Unmatched closing parenthesis', position: i });
      } else {
        prevAtomId = branchPoint;
      }
      resetPendingBond();
      i++;
      continue;
    }

    // Disconnected components
    if (ch === '.') {
      if (branchStack.length > 0) {
        errors.push({ message: 'Component separator inside a branch', position: i });
      }
      prevAtomId = null;
      resetPendingBond();
      i++;
      continue;
    }

    // Ring closures: digit or %nn
    if (ch >= '0' && ch <= '9') {
      closeRing(parseInt(ch, 10), i);
      i++;
      continue;
    }
    if (ch === '%') {
      const digits = smiles.slice(i + 1, i + 3);
      if (/^[0-9]{2}$/.test(digits)) {
        closeRing(parseInt(digits, 10), i);
        i += 3;
      } else {
        errors.push({ message: 'Invalid % ring closure', position: i });
        i++;
      }
      continue;
    }

    errors.push({ message: `Unsupported character: ${ch}`, position: i });
    i++;
  }

  for (const [digit, opening] of openRings) {
    errors.push({ message: `Ring closure ${digit} is never closed`, position: opening.position });
  }
  if (branchStack.length > 0) {
    errors.push({ message: 'Unmatched opening parentheses', position: -1 });
  }

  // Bonds written without a symbol between two aromatic atoms are aromatic
  for (const bond of bonds) {
    const a1 = atoms[bond.atom1];
    const a2 = atoms[bond.atom2];
    if (a1?.aromatic && a2?.aromatic && !explicitBonds.has(bondKey(bond.atom1, bond.atom2))) {
      bond.type = BondType.AROMATIC;
    }
  }

  assignImplicitHydrogens(atoms, bonds);

  for (const atom of atoms) {
    if (!atom.chiral) continue;
    atom.chiralNeighbors = (neighborOrder.get(atom.id) ?? [])
      .map(slot => slot.atomId)
      .filter((id): id is number => id !== null);
  }

  const molecule: Molecule = { atoms, bonds };

  enrichMolecule(molecule);
  if (sanitize) {
    perceiveAromaticity(molecule);
    removeImpossibleStereo(molecule);
  }

  return { molecule, errors };
}

/**
 * Strict variant of parseSMILES: any reported error is fatal.
 */
export function parseMolecule(smiles: string, options: ParseOptions = {}): Molecule {
  const { molecule, errors } = parseSMILES(smiles, options);
  const first = errors[0];
  if (first) {
    throw new MoleculeParseError(`Could not parse SMILES '${smiles}': ${first.message}`, {
      input: smiles,
      position: first.position,
      errors,
    });
  }
  return molecule;
}

export function isValidSMILES(smiles: string): boolean {
  return parseSMILES(smiles).errors.length === 0;
}

const BOND_SYMBOLS: Readonly<Record<string, { type: BondType; stereo: StereoType }>> = {
  '-': { type: BondType.SINGLE, stereo: StereoType.NONE },
  '=': { type: BondType.DOUBLE, stereo: StereoType.NONE },
  '#': { type: BondType.TRIPLE, stereo: StereoType.NONE },
  '$': { type: BondType.QUADRUPLE, stereo: StereoType.NONE },
  ':': { type: BondType.AROMATIC, stereo: StereoType.NONE },
  '/': { type: BondType.SINGLE, stereo: StereoType.UP },
  '\\': { type: BondType.SINGLE, stereo: StereoType.DOWN },
};

/**
 * OpenSMILES default valence rule for atoms written without brackets:
 * the hydrogen count fills up to the lowest default valence that is not
 * below the bond order sum; above every valence, no hydrogens.
 */
export function defaultHydrogenCount(atom: Atom, bondOrderSum: number): number {
  if (atom.symbol === '*') return 0;
  const valences = (atom.aromatic ? AROMATIC_VALENCES[atom.symbol] : undefined)
    ?? DEFAULT_VALENCES[atom.symbol]
    ?? [];
  const target = [...valences].sort((a, b) => a - b).find(v => v >= bondOrderSum);
  return target === undefined ? 0 : target - bondOrderSum;
}

export function bondOrderSum(atomId: number, bonds: Bond[]): number {
  let sum = 0;
  for (const bond of bonds) {
    if (bond.atom1 === atomId || bond.atom2 === atomId) {
      sum += bondOrder(bond.type);
    }
  }
  return sum;
}

function assignImplicitHydrogens(atoms: Atom[], bonds: Bond[]): void {
  for (const atom of atoms) {
    if (atom.isBracket) continue;
    atom.hydrogens = defaultHydrogenCount(atom, bondOrderSum(atom.id, bonds));
  }
}

// A tetrahedral tag needs at least three explicit neighbours
function removeImpossibleStereo(mol: Molecule): void {
  for (const atom of mol.atoms) {
    if (atom.chiral && (atom.degree ?? 0) < 3) {
      atom.chiral = null;
      delete atom.chiralNeighbors;
    }
  }
}
