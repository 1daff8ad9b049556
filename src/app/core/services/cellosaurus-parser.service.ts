/**
 * Cellosaurus Parser Service
 *
 * Parses the Cellosaurus flat-file dump (cellosaurus.txt) into raw entries.
 * Each line is a 2-character tag followed by padding and a value; entries
 * end with a "//" line.
 *
 * Format: https://ftp.expasy.org/databases/cellosaurus/cellosaurus.txt
 */

import { Diagnostic, MalformedInputError, warning } from '../models/diagnostics';
import { CrossReference, RawEntry } from '../models/registry';

/**
 * Options for parsing the catalog.
 */
export interface CellosaurusParseOptions {
  /** Source name used in diagnostics */
  sourceName?: string;

  /** Separator for repeated tags in the raw field map */
  fieldSeparator?: string;
}

/**
 * Result of parsing the catalog.
 */
export interface CellosaurusParseResult {
  /** Entries with an organism line */
  entries: RawEntry[];

  /** Skipped-entry warnings */
  diagnostics: Diagnostic[];

  /** Statistics about the parse */
  stats: {
    entryCount: number;
    skippedCount: number;
  };
}

const DEFAULT_OPTIONS: Required<CellosaurusParseOptions> = {
  sourceName: 'cellosaurus',
  fieldSeparator: '; ',
};

const ENTRY_TERMINATOR = '//';

/**
 * Tagged lines of one entry block.
 */
interface EntryBlock {
  startLine: number;
  lines: Array<{ tag: string; value: string }>;
}

/**
 * Cellosaurus Parser Service
 */
export class CellosaurusParserService {
  /**
   * Parses catalog text into raw entries.
   *
   * @throws MalformedInputError for a block without an ID line or an unterminated final block
   */
  parse(content: string, options: CellosaurusParseOptions = {}): CellosaurusParseResult {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const entries: RawEntry[] = [];
    const diagnostics: Diagnostic[] = [];
    let skippedCount = 0;

    for (const block of this.splitBlocks(content, opts.sourceName)) {
      const entry = this.buildEntry(block, opts);

      if (!entry.organism) {
        skippedCount++;
        diagnostics.push(
          warning(
            'MISSING_ORGANISM',
            `Entry ${entry.accession || entry.name} has no organism line and was skipped`,
            { subject: entry.accession || entry.name, source: opts.sourceName }
          )
        );
        continue;
      }

      entries.push(entry);
    }

    return {
      entries,
      diagnostics,
      stats: {
        entryCount: entries.length,
        skippedCount,
      },
    };
  }

  /**
   * Splits the text into tagged blocks. The preamble before the first ID
   * line (title, release notes, tag legend) is dropped.
   */
  private splitBlocks(content: string, sourceName: string): EntryBlock[] {
    const blocks: EntryBlock[] = [];
    let current: EntryBlock | null = null;
    let seenEntry = false;

    const lines = content.split(/\r?\n/);
    for (let index = 0; index < lines.length; index++) {
      const line = lines[index].trimEnd();
      const lineNumber = index + 1;

      if (line === ENTRY_TERMINATOR) {
        if (current && current.lines.length > 0) {
          blocks.push(current);
        }
        current = null;
        continue;
      }

      const parsed = parseTaggedLine(line);
      if (!parsed) {
        continue;
      }

      if (!seenEntry) {
        if (parsed.tag !== 'ID') {
          continue;
        }
        seenEntry = true;
      }

      if (!current) {
        current = { startLine: lineNumber, lines: [] };
      }
      current.lines.push(parsed);
    }

    if (current && current.lines.length > 0) {
      throw new MalformedInputError(
        `Entry starting in ${sourceName} is not terminated by "${ENTRY_TERMINATOR}"`,
        'UNTERMINATED_ENTRY',
        sourceName,
        current.startLine
      );
    }

    for (const block of blocks) {
      if (!block.lines.some((l) => l.tag === 'ID')) {
        throw new MalformedInputError(
          `Entry in ${sourceName} has no ID line`,
          'MISSING_ENTRY_ID',
          sourceName,
          block.startLine
        );
      }
    }

    return blocks;
  }

  private buildEntry(
    block: EntryBlock,
    opts: Required<CellosaurusParseOptions>
  ): RawEntry {
    const entry: RawEntry = {
      accession: '',
      name: '',
      organism: '',
      synonyms: [],
      crossReferences: [],
      diseases: [],
      comments: [],
      fields: {},
    };

    for (const { tag, value } of block.lines) {
      entry.fields[tag] =
        tag in entry.fields ? `${entry.fields[tag]}${opts.fieldSeparator}${value}` : value;

      switch (tag) {
        case 'ID':
          if (!entry.name) {
            entry.name = value;
          }
          break;
        case 'AC':
          if (!entry.accession) {
            entry.accession = value;
          }
          break;
        case 'SY':
          entry.synonyms.push(...splitSynonyms(value));
          break;
        case 'DR': {
          const ref = parseCrossReference(value);
          if (ref) {
            entry.crossReferences.push(ref);
          }
          break;
        }
        case 'OX':
          if (!entry.organism) {
            entry.organism = value;
          }
          break;
        case 'DI':
          entry.diseases.push(value);
          break;
        case 'SX':
          if (!entry.sex) {
            entry.sex = value;
          }
          break;
        case 'AG':
          if (!entry.age) {
            entry.age = value;
          }
          break;
        case 'CA':
          if (!entry.category) {
            entry.category = value;
          }
          break;
        case 'CC':
          entry.comments.push(value);
          break;
      }
    }

    return entry;
  }
}

/**
 * Splits a tagged line into tag and value.
 *
 * @example
 * parseTaggedLine('AC   CVCL_0030') // { tag: "AC", value: "CVCL_0030" }
 */
export function parseTaggedLine(line: string): { tag: string; value: string } | null {
  const match = line.match(/^([A-Z]{2})(?:\s+(.*))?$/);
  if (!match) {
    return null;
  }
  return { tag: match[1], value: (match[2] ?? '').trim() };
}

/**
 * Parses a DR value into database and identifier.
 *
 * @example
 * parseCrossReference('BTO; BTO_0000567') // { database: "BTO", identifier: "BTO_0000567" }
 */
export function parseCrossReference(value: string): CrossReference | null {
  const [database, identifier] = value.split(';').map((part) => part.trim());
  if (!database || !identifier) {
    return null;
  }
  return { database, identifier };
}

/**
 * Splits a synonym value on ";" and drops blanks.
 */
export function splitSynonyms(value: string, separator: string = ';'): string[] {
  return value
    .split(separator)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

// Export singleton instance for convenience
export const cellosaurusParser = new CellosaurusParserService();
