/**
 * OBO Parser Service
 *
 * Parses OBO flat-file ontologies (BTO, CL) into a TermGraph.
 * Parsing is all-or-nothing: a [Term] stanza without an id aborts the load.
 * When an id is repeated, the first stanza that is kept wins.
 */

import { MalformedInputError } from '../models/diagnostics';
import { TermGraph, TermNode } from '../models/term-graph';

/**
 * Options for parsing OBO files.
 */
export interface OboParseOptions {
  /** Source name used in error messages */
  sourceName?: string;

  /** Whether obsolete terms are kept in the graph */
  includeObsolete?: boolean;
}

const DEFAULT_OPTIONS: Required<OboParseOptions> = {
  sourceName: 'ontology',
  includeObsolete: true,
};

/**
 * Stanza being accumulated.
 */
interface TermStanza {
  startLine: number;
  id?: string;
  name?: string;
  synonyms: Set<string>;
  parents: Set<string>;
  obsolete: boolean;
}

/**
 * OBO Parser Service
 */
export class OboParserService {
  /**
   * Parses OBO content into a term graph.
   *
   * @throws MalformedInputError when a [Term] stanza has no id line
   */
  parse(content: string, options: OboParseOptions = {}): TermGraph {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const graph = new Map<string, TermNode>();
    const lines = content.split(/\r?\n/);

    let current: TermStanza | null = null;
    // Non-[Term] stanzas (Typedef, Instance) are read past
    let inOtherStanza = false;

    const flush = () => {
      if (current) {
        this.addTerm(graph, current, opts);
        current = null;
      }
      inOtherStanza = false;
    };

    lines.forEach((rawLine, index) => {
      const line = rawLine.trim();
      const lineNumber = index + 1;

      if (line.startsWith('[') && line.endsWith(']')) {
        flush();
        if (line === '[Term]') {
          current = {
            startLine: lineNumber,
            synonyms: new Set(),
            parents: new Set(),
            obsolete: false,
          };
        } else {
          inOtherStanza = true;
        }
        return;
      }

      if (line === '') {
        flush();
        return;
      }

      if (!current || inOtherStanza || line.startsWith('!')) {
        return;
      }

      const separator = line.indexOf(':');
      if (separator === -1) {
        return;
      }
      const tag = line.substring(0, separator).trim();
      const value = line.substring(separator + 1).trim();

      switch (tag) {
        case 'id':
          current.id = value;
          break;
        case 'name':
          current.name = value;
          break;
        case 'synonym': {
          const synonym = parseSynonymValue(value);
          if (synonym) {
            current.synonyms.add(synonym);
          }
          break;
        }
        case 'is_a':
          current.parents.add(stripTrailingComment(value));
          break;
        case 'is_obsolete':
          current.obsolete = value === 'true';
          break;
      }
    });

    flush();

    return graph;
  }

  private addTerm(
    graph: Map<string, TermNode>,
    stanza: TermStanza,
    opts: Required<OboParseOptions>
  ): void {
    if (!stanza.id) {
      throw new MalformedInputError(
        `[Term] stanza without an id in ${opts.sourceName}`,
        'MISSING_TERM_ID',
        opts.sourceName,
        stanza.startLine
      );
    }

    if ((stanza.obsolete && !opts.includeObsolete) || graph.has(stanza.id)) {
      return;
    }

    graph.set(
      stanza.id,
      Object.freeze({
        id: stanza.id,
        name: stanza.name ?? stanza.id,
        synonyms: stanza.synonyms,
        parents: stanza.parents,
        obsolete: stanza.obsolete,
      })
    );
  }
}

/**
 * Extracts the quoted text of a synonym line.
 *
 * @example
 * parseSynonymValue('"HeLa" EXACT []') // "HeLa"
 */
export function parseSynonymValue(value: string): string | undefined {
  const match = value.match(/^"((?:[^"\\]|\\.)*)"/);
  if (match) {
    return match[1].replace(/\\(.)/g, '$1').trim() || undefined;
  }
  return value.trim() || undefined;
}

/**
 * Removes a trailing "! comment" and OBO qualifiers from a tag value.
 *
 * @example
 * stripTrailingComment('BTO:0000214 ! cell culture') // "BTO:0000214"
 */
export function stripTrailingComment(value: string): string {
  const bang = value.indexOf('!');
  const withoutComment = bang === -1 ? value : value.substring(0, bang);
  const brace = withoutComment.indexOf('{');
  return (brace === -1 ? withoutComment : withoutComment.substring(0, brace)).trim();
}

// Export singleton instance for convenience
export const oboParser = new OboParserService();
