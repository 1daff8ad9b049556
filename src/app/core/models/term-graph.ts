/**
 * Term Graph Models
 *
 * In-memory form of an OBO ontology (BTO, CL): terms keyed by identifier,
 * with parent links kept as an adjacency mapping.
 */

/**
 * Ontologies consulted while building the registry.
 */
export type OntologyPrefix =
  | 'bto'  // BRENDA Tissue Ontology (tissues and cell lines)
  | 'cl';  // Cell Ontology

/**
 * A single ontology term.
 */
export interface TermNode {
  /** Term ID (e.g., "BTO:0000567") */
  readonly id: string;

  /** Canonical name (e.g., "HeLa cell") */
  readonly name: string;

  /** Synonym strings */
  readonly synonyms: ReadonlySet<string>;

  /** Parent term IDs from is_a lines */
  readonly parents: ReadonlySet<string>;

  /** Whether the term is marked obsolete */
  readonly obsolete: boolean;
}

/**
 * Parsed ontology, immutable after load.
 */
export type TermGraph = ReadonlyMap<string, TermNode>;

/**
 * Normalizes an ontology identifier to the OBO "PREFIX:LOCAL" form.
 *
 * @example
 * normalizeTermId('BTO_0000567') // "BTO:0000567"
 * normalizeTermId('cl:0000066')  // "CL:0000066"
 */
export function normalizeTermId(id: string): string {
  const match = id.trim().match(/^([A-Za-z]+)[_:](.+)$/);
  if (!match) {
    return id.trim();
  }
  return `${match[1].toUpperCase()}:${match[2]}`;
}

/**
 * Looks up a term by identifier in any of the accepted spellings.
 */
export function lookupTerm(graph: TermGraph, id: string): TermNode | undefined {
  return graph.get(normalizeTermId(id));
}

/**
 * Returns every ancestor of a term, nearest first.
 *
 * Breadth-first over parent links. The visited set keeps cyclic
 * input from looping; unknown parent IDs are returned but not expanded.
 */
export function getAncestors(graph: TermGraph, id: string): string[] {
  const start = normalizeTermId(id);
  const visited = new Set<string>([start]);
  const ancestors: string[] = [];
  const queue: string[] = [...(graph.get(start)?.parents ?? [])];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || visited.has(current)) {
      continue;
    }
    visited.add(current);
    ancestors.push(current);

    const node = graph.get(current);
    if (node) {
      for (const parent of node.parents) {
        if (!visited.has(parent)) {
          queue.push(parent);
        }
      }
    }
  }

  return ancestors;
}

