import type { Atom, Bond, Molecule } from 'types';
import { BondType, IMPLICIT_HYDROGEN } from 'types';
import { sortBy, uniq } from 'es-toolkit';
import { isOrganicAtom } from 'src/utils/atom-utils';
import { buildAdjacency } from 'src/utils/bond-utils';
import type { Neighbor } from 'src/utils/bond-utils';
import { bondOrderSum, defaultHydrogenCount } from 'src/parser';
import { permutationParity } from 'src/matchers/substructure-matcher';

// Canonical SMILES strategy:
// - rank atoms by iterative invariant refinement, breaking remaining ties one at a time
// - write every component by DFS from its lowest-ranked atom, neighbours in rank order
// - sort the component strings so input atom order never shows through

export interface SMILESOptions {
  useStereo?: boolean; // write tetrahedral tags (default false)
}

export function generateCanonicalSMILES(molecule: Molecule, options: SMILESOptions = {}): string {
  if (molecule.atoms.length === 0) return '';

  const useStereo = options.useStereo ?? false;
  const adjacency = buildAdjacency(molecule);
  const ranks = canonicalRanks(molecule, adjacency);

  const components = findComponents(molecule, adjacency, ranks);
  const parts = components.map(root => writeComponent(root, molecule, adjacency, ranks, useStereo));
  return parts.sort().join('.');
}

function bondCode(bond: Bond): number {
  switch (bond.type) {
    case BondType.SINGLE: return 1;
    case BondType.DOUBLE: return 2;
    case BondType.TRIPLE: return 3;
    case BondType.QUADRUPLE: return 4;
    case BondType.AROMATIC: return 5;
  }
}

function atomInvariant(atom: Atom, degree: number): string {
  return [
    String(atom.atomicNumber).padStart(3, '0'),
    atom.aromatic ? '1' : '0',
    String(degree).padStart(2, '0'),
    String(atom.hydrogens).padStart(2, '0'),
    String(atom.charge + 50).padStart(3, '0'),
    String(atom.isotope ?? 0).padStart(3, '0'),
    atom.isInRing ? '1' : '0',
  ].join('|');
}

/**
 * Rank per atom id, every rank distinct.
 */
export function canonicalRanks(mol: Molecule, adjacency: Map<number, Neighbor[]>): Map<number, number> {
  const initial = new Map<number, string>();
  for (const atom of mol.atoms) {
    initial.set(atom.id, atomInvariant(atom, adjacency.get(atom.id)?.length ?? 0));
  }
  let ranks = rankByLabel(mol, initial);
  ranks = refine(mol, adjacency, ranks);

  for (;;) {
    const tied = lowestTiedRank(ranks);
    if (tied === null) return ranks;

    // Split the lowest tied class by promoting its first member, then propagate
    const doubled = new Map<number, number>();
    let promoted = false;
    for (const atom of mol.atoms) {
      const rank = ranks.get(atom.id) ?? 0;
      if (rank === tied && !promoted) {
        doubled.set(atom.id, rank * 2 - 1);
        promoted = true;
      } else {
        doubled.set(atom.id, rank * 2);
      }
    }
    ranks = refine(mol, adjacency, doubled);
  }
}

function rankByLabel(mol: Molecule, labels: Map<number, string>): Map<number, number> {
  const sortedLabels = uniq(mol.atoms.map(a => labels.get(a.id) ?? '')).sort();
  const position = new Map(sortedLabels.map((label, index) => [label, index + 1]));
  const ranks = new Map<number, number>();
  for (const atom of mol.atoms) {
    ranks.set(atom.id, position.get(labels.get(atom.id) ?? '') ?? 0);
  }
  return ranks;
}

function refine(mol: Molecule, adjacency: Map<number, Neighbor[]>, start: Map<number, number>): Map<number, number> {
  let ranks = start;
  let classes = countClasses(ranks);
  for (;;) {
    const labels = new Map<number, string>();
    for (const atom of mol.atoms) {
      const neighborhood = (adjacency.get(atom.id) ?? [])
        .map(n => [ranks.get(n.atomId) ?? 0, bondCode(n.bond)] as const)
        .sort((a, b) => a[0] - b[0] || a[1] - b[1])
        .map(([rank, code]) => `${String(rank).padStart(6, '0')}:${code}`);
      labels.set(atom.id, `${String(ranks.get(atom.id) ?? 0).padStart(6, '0')}|${neighborhood.join(',')}`);
    }
    const next = rankByLabel(mol, labels);
    const nextClasses = countClasses(next);
    if (nextClasses === classes) return next;
    ranks = next;
    classes = nextClasses;
  }
}

function countClasses(ranks: Map<number, number>): number {
  return new Set(ranks.values()).size;
}

function lowestTiedRank(ranks: Map<number, number>): number | null {
  const counts = new Map<number, number>();
  for (const rank of ranks.values()) {
    counts.set(rank, (counts.get(rank) ?? 0) + 1);
  }
  const tied = [...counts].filter(([, count]) => count > 1).map(([rank]) => rank);
  return tied.length === 0 ? null : Math.min(...tied);
}

function findComponents(mol: Molecule, adjacency: Map<number, Neighbor[]>, ranks: Map<number, number>): number[] {
  const roots: number[] = [];
  const seen = new Set<number>();
  for (const atom of sortBy(mol.atoms, [a => ranks.get(a.id) ?? 0])) {
    if (seen.has(atom.id)) continue;
    roots.push(atom.id);
    const stack = [atom.id];
    seen.add(atom.id);
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      for (const n of adjacency.get(current) ?? []) {
        if (seen.has(n.atomId)) continue;
        seen.add(n.atomId);
        stack.push(n.atomId);
      }
    }
  }
  return roots;
}

interface Traversal {
  children: Map<number, Neighbor[]>;
  ringOpenings: Map<number, Neighbor[]>; // ring bonds written first at this atom
  ringClosings: Map<number, Neighbor[]>; // ring bonds completed at this atom
}

function traverse(root: number, adjacency: Map<number, Neighbor[]>, ranks: Map<number, number>): Traversal {
  const traversal: Traversal = {
    children: new Map(),
    ringOpenings: new Map(),
    ringClosings: new Map(),
  };
  const visited = new Set<number>();
  const order = new Map<number, number>();

  const visit = (atomId: number, parentId: number | null) => {
    visited.add(atomId);
    order.set(atomId, order.size);
    traversal.children.set(atomId, []);
    traversal.ringOpenings.set(atomId, traversal.ringOpenings.get(atomId) ?? []);
    traversal.ringClosings.set(atomId, traversal.ringClosings.get(atomId) ?? []);

    const neighbors = sortBy(adjacency.get(atomId) ?? [], [n => ranks.get(n.atomId) ?? 0]);
    for (const n of neighbors) {
      if (n.atomId === parentId) continue;
      if (visited.has(n.atomId)) {
        // Back edge to an ancestor still on the stack: that ancestor opens the ring
        if ((order.get(n.atomId) ?? 0) < (order.get(atomId) ?? 0)) {
          traversal.ringClosings.get(atomId)?.push(n);
          const opening = traversal.ringOpenings.get(n.atomId) ?? [];
          opening.push({ atomId, bond: n.bond });
          traversal.ringOpenings.set(n.atomId, opening);
        }
        continue;
      }
      traversal.children.get(atomId)?.push(n);
      visit(n.atomId, atomId);
    }
  };

  visit(root, null);
  return traversal;
}

function writeComponent(
  root: number,
  mol: Molecule,
  adjacency: Map<number, Neighbor[]>,
  ranks: Map<number, number>,
  useStereo: boolean,
): string {
  const traversal = traverse(root, adjacency, ranks);
  const openDigits = new Map<string, number>(); // "opener-closer" -> digit
  const inUse = new Set<number>();

  const takeDigit = (): number => {
    let digit = 1;
    while (inUse.has(digit)) digit++;
    inUse.add(digit);
    return digit;
  };

  const write = (atomId: number, parentId: number | null, incoming: Bond | null): string => {
    const atom = mol.atoms[atomId];
    if (!atom) return '';

    let out = '';
    if (incoming && parentId !== null) {
      out += bondSymbol(incoming, mol.atoms[parentId], atom);
    }

    // Closures are written at the atom in the order the rings were opened
    const closings = sortBy(traversal.ringClosings.get(atomId) ?? [], [
      n => openDigits.get(`${n.atomId}-${atomId}`) ?? 0,
    ]);
    const openings = traversal.ringOpenings.get(atomId) ?? [];

    let ringText = '';
    const writtenOrder: number[] = [];
    if (parentId !== null) writtenOrder.push(parentId);
    if (atom.hydrogens > 0) writtenOrder.push(IMPLICIT_HYDROGEN);

    for (const n of closings) {
      const key = `${n.atomId}-${atomId}`;
      const digit = openDigits.get(key) ?? 0;
      openDigits.delete(key);
      inUse.delete(digit);
      ringText += ringDigit(digit);
      writtenOrder.push(n.atomId);
    }
    for (const n of openings) {
      const digit = takeDigit();
      openDigits.set(`${atomId}-${n.atomId}`, digit);
      ringText += bondSymbol(n.bond, atom, mol.atoms[n.atomId]) + ringDigit(digit);
      writtenOrder.push(n.atomId);
    }

    const children = traversal.children.get(atomId) ?? [];
    writtenOrder.push(...children.map(c => c.atomId));

    out += atomSymbol(atom, mol, useStereo, writtenOrder) + ringText;

    children.forEach((child, index) => {
      const branch = write(child.atomId, atomId, child.bond);
      out += index < children.length - 1 ? `(${branch})` : branch;
    });
    return out;
  };

  return write(root, null, null);
}

function ringDigit(digit: number): string {
  return digit < 10 ? String(digit) : `%${digit}`;
}

function bondSymbol(bond: Bond, from: Atom | undefined, to: Atom | undefined): string {
  const bothAromatic = from?.aromatic === true && to?.aromatic === true;
  switch (bond.type) {
    case BondType.SINGLE: return bothAromatic ? '-' : '';
    case BondType.DOUBLE: return '=';
    case BondType.TRIPLE: return '#';
    case BondType.QUADRUPLE: return '$';
    case BondType.AROMATIC: return bothAromatic ? '' : ':';
  }
}

function atomSymbol(atom: Atom, mol: Molecule, useStereo: boolean, writtenOrder: number[]): string {
  const element = atom.aromatic ? atom.symbol.toLowerCase() : atom.symbol;
  const chiral = useStereo ? outputChirality(atom, writtenOrder) : null;

  const defaultHydrogens = defaultHydrogenCount(atom, bondOrderSum(atom.id, mol.bonds));
  const bare = (isOrganicAtom(atom.symbol) || atom.symbol === '*')
    && atom.charge === 0
    && atom.isotope === null
    && atom.atomClass === 0
    && chiral === null
    && atom.hydrogens === defaultHydrogens;
  if (bare) return element;

  let out = '[';
  if (atom.isotope !== null) out += String(atom.isotope);
  out += element;
  if (chiral) out += chiral;
  if (atom.hydrogens > 0) out += atom.hydrogens === 1 ? 'H' : `H${atom.hydrogens}`;
  if (atom.charge !== 0) {
    const sign = atom.charge > 0 ? '+' : '-';
    const magnitude = Math.abs(atom.charge);
    out += magnitude === 1 ? sign : `${sign}${magnitude}`;
  }
  if (atom.atomClass !== 0) out += `:${atom.atomClass}`;
  return out + ']';
}

/**
 * Tag to write so that the written neighbour order describes the same
 * configuration as the order the tag was read with.
 */
function outputChirality(atom: Atom, writtenOrder: number[]): Atom['chiral'] {
  if (!atom.chiral || !atom.chiralNeighbors) return null;
  const parity = permutationParity(atom.chiralNeighbors, writtenOrder);
  if (parity === null || atom.chiralNeighbors.length !== writtenOrder.length) return atom.chiral;
  if (parity === 0) return atom.chiral;
  return atom.chiral === '@' ? '@@' : '@';
}
