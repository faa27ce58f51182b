import type { Molecule } from 'types';
import type { ChemistryToolkit } from './capabilities';
import { parseMolecule } from 'src/parser';
import { countSubstructureMatches, hasSubstructureMatch } from 'src/matchers/substructure-matcher';
import { generateCanonicalSMILES } from 'src/generators/smiles-generator';
import { pickleMolecule, unpickleMolecule } from 'src/utils/mol-pickle';
import { countRings } from 'src/utils/ring-finder';
import { isHeavyAtom } from 'src/utils/atom-utils';

export type MoleculeToolkit = ChemistryToolkit<Molecule, Molecule>;

/**
 * The in-repo chemistry pieces behind the screening capability interfaces.
 * Fragment patterns compile to unsanitized query graphs, so aromatic
 * atoms written outside a ring keep their aromatic bonds.
 */
export function createToolkit(): MoleculeToolkit {
  return {
    compilePattern: source => parseMolecule(source, { sanitize: false }),
    countMatches: (molecule, pattern, params) =>
      countSubstructureMatches(molecule, pattern, {
        uniqueMatches: params.uniquify,
        maxMatches: params.maxMatches,
        useChirality: params.useChirality,
      }),

    heavyAtomCount: molecule => molecule.atoms.filter(isHeavyAtom).length,
    ringCount: molecule => molecule.rings?.length ?? countRings(molecule.atoms, molecule.bonds),
    hasStereocenter: molecule => molecule.atoms.some(atom => atom.chiral !== null),
    hasFormalCharge: molecule => molecule.atoms.some(atom => atom.charge !== 0),

    isSubstructureMatch: (target, query, options) => hasSubstructureMatch(target, query, options),
    countAllMatches: (target, query, options) =>
      countSubstructureMatches(target, query, { uniqueMatches: true, useChirality: options.useChirality }),
    canonicalForm: (molecule, useStereo) => generateCanonicalSMILES(molecule, { useStereo }),

    parse: text => parseMolecule(text),
    serialize: molecule => pickleMolecule(molecule),
    deserialize: payload => unpickleMolecule(payload),
  };
}
