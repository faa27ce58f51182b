import type { Molecule, Atom, Bond } from 'types';
import { IMPLICIT_HYDROGEN } from 'types';
import { buildAdjacency, bondKey } from 'src/utils/bond-utils';
import type { Neighbor } from 'src/utils/bond-utils';

export interface SubstructureMatchOptions {
  uniqueMatches?: boolean; // drop matches covering an atom set already reported (default true)
  maxMatches?: number; // stop after this many matches (default unlimited)
  useChirality?: boolean; // tetrahedral tags on the query must agree with the target (default false)
}

/** Target atom id for every query atom, indexed by query atom id. */
export type AtomMapping = number[];

// Placeholder for a neighbour slot that has no partner on the other side
const UNMAPPED = -2;

interface SearchState {
  query: Molecule;
  target: Molecule;
  order: number[];
  parents: (number | null)[];
  queryAdjacency: Map<number, Neighbor[]>;
  targetAdjacency: Map<number, Neighbor[]>;
  targetBonds: Map<string, Bond>;
  mapping: Map<number, number>;
  used: Set<number>;
  seen: Set<string>;
  matches: AtomMapping[];
  unique: boolean;
  limit: number;
  useChirality: boolean;
}

/**
 * Enumerate subgraph isomorphisms of `query` into `target`.
 *
 * Atoms match on atomic number (the wildcard matches anything); a charged
 * or isotope-labelled query atom also requires the same charge or isotope.
 * Bonds match on type, so aliphatic and aromatic bonds never match each other.
 */
export function findSubstructureMatches(
  target: Molecule,
  query: Molecule,
  options: SubstructureMatchOptions = {},
): AtomMapping[] {
  const limit = options.maxMatches ?? Infinity;
  if (query.atoms.length === 0 || query.atoms.length > target.atoms.length || limit <= 0) {
    return [];
  }

  const queryAdjacency = buildAdjacency(query);
  const { order, parents } = searchOrder(query, queryAdjacency);

  const state: SearchState = {
    query,
    target,
    order,
    parents,
    queryAdjacency,
    targetAdjacency: buildAdjacency(target),
    targetBonds: new Map(target.bonds.map(b => [bondKey(b.atom1, b.atom2), b])),
    mapping: new Map(),
    used: new Set(),
    seen: new Set(),
    matches: [],
    unique: options.uniqueMatches ?? true,
    limit,
    useChirality: options.useChirality ?? false,
  };

  extend(state, 0);
  return state.matches;
}

export function countSubstructureMatches(
  target: Molecule,
  query: Molecule,
  options: SubstructureMatchOptions = {},
): number {
  return findSubstructureMatches(target, query, options).length;
}

export function hasSubstructureMatch(
  target: Molecule,
  query: Molecule,
  options: Omit<SubstructureMatchOptions, 'maxMatches'> = {},
): boolean {
  return findSubstructureMatches(target, query, { ...options, maxMatches: 1 }).length > 0;
}

/**
 * Breadth-first order over every query component, so each atom after a
 * component's root has an already-placed parent to anchor candidates on.
 */
function searchOrder(query: Molecule, adjacency: Map<number, Neighbor[]>): { order: number[]; parents: (number | null)[] } {
  const order: number[] = [];
  const parents: (number | null)[] = [];
  const placed = new Set<number>();

  for (const root of query.atoms) {
    if (placed.has(root.id)) continue;
    placed.add(root.id);
    order.push(root.id);
    parents.push(null);

    for (let head = order.length - 1; head < order.length; head++) {
      const current = order[head];
      if (current === undefined) break;
      for (const neighbor of adjacency.get(current) ?? []) {
        if (placed.has(neighbor.atomId)) continue;
        placed.add(neighbor.atomId);
        order.push(neighbor.atomId);
        parents.push(current);
      }
    }
  }

  return { order, parents };
}

function extend(state: SearchState, depth: number): void {
  if (state.matches.length >= state.limit) return;

  const queryId = state.order[depth];
  if (queryId === undefined) {
    recordMatch(state);
    return;
  }

  const queryAtom = state.query.atoms[queryId];
  if (!queryAtom) return;

  const parent = state.parents[depth];
  const parentTarget = parent === null || parent === undefined ? undefined : state.mapping.get(parent);
  const candidates = parentTarget === undefined
    ? state.target.atoms.map(a => a.id)
    : (state.targetAdjacency.get(parentTarget) ?? []).map(n => n.atomId);

  const queryDegree = state.queryAdjacency.get(queryId)?.length ?? 0;

  for (const candidate of candidates) {
    if (state.used.has(candidate)) continue;
    const targetAtom = state.target.atoms[candidate];
    if (!targetAtom || !atomsMatch(queryAtom, targetAtom)) continue;
    if ((state.targetAdjacency.get(candidate)?.length ?? 0) < queryDegree) continue;
    if (!bondsToMappedMatch(state, queryId, candidate)) continue;

    state.mapping.set(queryId, candidate);
    state.used.add(candidate);
    extend(state, depth + 1);
    state.mapping.delete(queryId);
    state.used.delete(candidate);

    if (state.matches.length >= state.limit) return;
  }
}

function recordMatch(state: SearchState): void {
  if (state.useChirality && !chiralityAgrees(state)) return;

  const mapping: AtomMapping = state.query.atoms.map(a => state.mapping.get(a.id) ?? -1);
  if (state.unique) {
    const key = [...mapping].sort((a, b) => a - b).join(',');
    if (state.seen.has(key)) return;
    state.seen.add(key);
  }
  state.matches.push(mapping);
}

export function atomsMatch(query: Atom, target: Atom): boolean {
  if (query.atomicNumber !== 0 && query.atomicNumber !== target.atomicNumber) return false;
  if (query.charge !== 0 && query.charge !== target.charge) return false;
  if (query.isotope !== null && query.isotope !== target.isotope) return false;
  return true;
}

function bondsToMappedMatch(state: SearchState, queryId: number, candidate: number): boolean {
  for (const neighbor of state.queryAdjacency.get(queryId) ?? []) {
    const mappedNeighbor = state.mapping.get(neighbor.atomId);
    if (mappedNeighbor === undefined) continue;
    const targetBond = state.targetBonds.get(bondKey(candidate, mappedNeighbor));
    if (!targetBond || targetBond.type !== neighbor.bond.type) return false;
  }
  return true;
}

function chiralityAgrees(state: SearchState): boolean {
  for (const queryAtom of state.query.atoms) {
    if (!queryAtom.chiral) continue;
    const targetId = state.mapping.get(queryAtom.id);
    const targetAtom = targetId === undefined ? undefined : state.target.atoms[targetId];
    if (!targetAtom?.chiral) return false;

    const parity = neighborParity(queryAtom, targetAtom, state.mapping);
    if (parity === null) continue;
    const sameTag = queryAtom.chiral === targetAtom.chiral;
    if (sameTag !== (parity === 0)) return false;
  }
  return true;
}

/**
 * Parity (0 even, 1 odd) of the permutation taking the query's neighbour
 * order, translated into target ids, onto the target's neighbour order.
 * Null when the two orders cannot be lined up.
 */
function neighborParity(queryAtom: Atom, targetAtom: Atom, mapping: Map<number, number>): 0 | 1 | null {
  const translated = (queryAtom.chiralNeighbors ?? []).map(id =>
    id === IMPLICIT_HYDROGEN ? IMPLICIT_HYDROGEN : mapping.get(id) ?? UNMAPPED,
  );
  const targetOrder = [...(targetAtom.chiralNeighbors ?? [])];
  if (translated.length === 3) translated.push(UNMAPPED);
  if (targetOrder.length === 3) targetOrder.push(UNMAPPED);
  if (translated.length !== 4 || targetOrder.length !== 4) return null;

  const left = translated.map(id => (targetOrder.includes(id) ? id : UNMAPPED));
  const right = targetOrder.map(id => (left.includes(id) ? id : UNMAPPED));
  if (left.filter(id => id === UNMAPPED).length > 1) return null;
  if (right.filter(id => id === UNMAPPED).length > 1) return null;

  return permutationParity(left, right);
}

export function permutationParity(from: readonly number[], to: readonly number[]): 0 | 1 | null {
  const positions = from.map(item => to.indexOf(item));
  if (positions.some(p => p < 0) || new Set(positions).size !== positions.length) return null;

  let swaps = 0;
  const work = [...positions];
  for (let i = 0; i < work.length; i++) {
    while (work[i] !== i) {
      const j = work[i];
      if (j === undefined) return null;
      const tmp = work[j];
      if (tmp === undefined) return null;
      work[j] = j;
      work[i] = tmp;
      swaps++;
    }
  }
  return swaps % 2 === 0 ? 0 : 1;
}
