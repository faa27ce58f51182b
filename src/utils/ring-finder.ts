import type { Atom, Bond } from 'types';
import { sortBy } from 'es-toolkit';
import { bondKey } from './bond-utils';

/**
 * Smallest set of smallest rings.
 *
 * Candidates are Horton cycles: for every root atom and every edge (x, y), the
 * cycle formed by the shortest paths root->x, root->y and the edge itself,
 * kept when the two paths only share the root. Sorted by size, they are added
 * greedily while independent over GF(2), until the cyclomatic number
 * (bonds - atoms + components) is reached.
 *
 * Rings are returned as atom ids in ring order, smallest first.
 */
export function findSSSR(atoms: Atom[], bonds: Bond[]): number[][] {
  const expected = bonds.length - atoms.length + countConnectedComponents(atoms, bonds);
  if (expected <= 0) {
    return [];
  }

  const adjacency = new Map<number, number[]>();
  for (const atom of atoms) {
    adjacency.set(atom.id, []);
  }
  for (const bond of bonds) {
    adjacency.get(bond.atom1)?.push(bond.atom2);
    adjacency.get(bond.atom2)?.push(bond.atom1);
  }

  const edgeIndex = new Map<string, number>();
  bonds.forEach((bond, index) => edgeIndex.set(bondKey(bond.atom1, bond.atom2), index));

  const candidates = new Map<string, number[]>();
  for (const root of atoms) {
    const parents = shortestPathTree(root.id, adjacency);
    for (const bond of bonds) {
      const cycle = hortonCycle(root.id, bond.atom1, bond.atom2, parents);
      if (!cycle) continue;
      const key = cycleEdges(cycle).sort().join('|');
      if (!candidates.has(key)) {
        candidates.set(key, cycle);
      }
    }
  }

  const ordered = sortBy([...candidates.entries()], [([, cycle]) => cycle.length, ([key]) => key]);

  const basis = new Map<number, bigint>();
  const rings: number[][] = [];
  for (const [, cycle] of ordered) {
    if (rings.length >= expected) break;
    let vector = 0n;
    for (const edge of cycleEdges(cycle)) {
      const index = edgeIndex.get(edge);
      if (index === undefined) continue;
      vector ^= 1n << BigInt(index);
    }
    if (reduceIntoBasis(vector, basis)) {
      rings.push(cycle);
    }
  }

  return rings;
}

/**
 * Number of rings in the smallest set of smallest rings
 */
export function countRings(atoms: Atom[], bonds: Bond[]): number {
  return Math.max(0, bonds.length - atoms.length + countConnectedComponents(atoms, bonds));
}

export function countConnectedComponents(atoms: Atom[], bonds: Bond[]): number {
  const parent = new Map<number, number>();
  for (const atom of atoms) {
    parent.set(atom.id, atom.id);
  }

  const find = (id: number): number => {
    let current = id;
    let next = parent.get(current);
    while (next !== undefined && next !== current) {
      current = next;
      next = parent.get(current);
    }
    return current;
  };

  let components = atoms.length;
  for (const bond of bonds) {
    const a = find(bond.atom1);
    const b = find(bond.atom2);
    if (a !== b) {
      parent.set(a, b);
      components--;
    }
  }
  return components;
}

function shortestPathTree(rootId: number, adjacency: Map<number, number[]>): Map<number, number | null> {
  const parents = new Map<number, number | null>([[rootId, null]]);
  const queue = [rootId];
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) break;
    for (const neighbor of adjacency.get(current) ?? []) {
      if (parents.has(neighbor)) continue;
      parents.set(neighbor, current);
      queue.push(neighbor);
    }
  }
  return parents;
}

function pathToRoot(atomId: number, parents: Map<number, number | null>): number[] | null {
  if (!parents.has(atomId)) return null;
  const path: number[] = [];
  let current: number | null | undefined = atomId;
  while (current !== null && current !== undefined) {
    path.push(current);
    current = parents.get(current);
  }
  return path;
}

function hortonCycle(
  rootId: number,
  x: number,
  y: number,
  parents: Map<number, number | null>
): number[] | null {
  // tree edges close no cycle
  if (parents.get(x) === y || parents.get(y) === x) return null;

  const px = pathToRoot(x, parents);
  const py = pathToRoot(y, parents);
  if (!px || !py) return null;

  const onPx = new Set(px);
  const shared = py.filter(id => onPx.has(id));
  if (shared.length !== 1 || shared[0] !== rootId) return null;

  // root ... x, then y ... back towards root (root excluded)
  const fromRoot = [...px].reverse();
  const back = py.slice(0, -1);
  const cycle = [...fromRoot, ...back];
  return cycle.length >= 3 ? cycle : null;
}

function cycleEdges(cycle: number[]): string[] {
  const edges: string[] = [];
  for (let i = 0; i < cycle.length; i++) {
    const a = cycle[i];
    const b = cycle[(i + 1) % cycle.length];
    if (a === undefined || b === undefined) continue;
    edges.push(bondKey(a, b));
  }
  return edges;
}

function highestBit(vector: bigint): number {
  return vector.toString(2).length - 1;
}

function reduceIntoBasis(vector: bigint, basis: Map<number, bigint>): boolean {
  let v = vector;
  while (v !== 0n) {
    const pivot = highestBit(v);
    const row = basis.get(pivot);
    if (row === undefined) {
      basis.set(pivot, v);
      return true;
    }
    v ^= row;
  }
  return false;
}
