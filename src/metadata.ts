import { isValid, parse } from 'date-fns';
import { IncompleteMetadataError } from './errors.js';
import { extractTable } from './table.js';
import { stripMarkup } from './text.js';
import { Block, PolicyMetadata, RevisionRecord, TocEntry } from './types.js';

export const DEFAULT_TITLE = 'X.509 Certificate Policy for the U.S. Federal PKI Common Policy Framework';

const LONG_DATE_FORMAT = 'MMMM d, yyyy';

const VERSION_PREFIX = 'Version ';

// "[1.2 Name [...": group 1 is the section number, group 2 the name
const TOC_ENTRY_PATTERN = /^\[(\d+(?:\.\d+)*)\.?\s+(.+?)\s*\[/;

// Characters that open lines already handled elsewhere (lists, markup, links, notes)
const STRUCTURAL_MARKERS = '*<[(';

/**
 * Parse a long-form date such as "January 1, 2020". Returns null if it isn't one.
 */
export function parseLongDate(text: string): Date | null {
  const value = text.trim();
  if (!value) return null;

  const parsed = parse(value, LONG_DATE_FORMAT, new Date());
  return isValid(parsed) ? parsed : null;
}

/**
 * Turn revision-history table rows into records. A row whose date column does
 * not parse is a header row and is skipped.
 */
export function toRevisionRecords(rows: string[][]): RevisionRecord[] {
  const records: RevisionRecord[] = [];

  for (const row of rows) {
    if (row.length < 2) continue;

    const published = parseLongDate(row[1]);
    if (!published) continue;

    records.push({
      version: row[0].trim(),
      published,
      remarks: row.slice(2).join(' ').trim()
    });
  }

  return records;
}

export function parseTocEntry(line: string): TocEntry | null {
  const match = line.match(TOC_ENTRY_PATTERN);
  if (!match) return null;
  return { number: match[1], name: match[2] };
}

export interface FrontMatter {
  metadata: PolicyMetadata;
  toc: TocEntry[];
}

/**
 * Walk the front-matter lines and collect the version, publication date,
 * revision history and table of contents.
 */
export function parseFrontMatter(block: Block, title: string = DEFAULT_TITLE): FrontMatter {
  let version = '';
  let published: Date | null = null;
  const revisions: RevisionRecord[] = [];
  const toc: TocEntry[] = [];

  let inTable = false;
  let inToc = false;
  let tableLines: string[] = [];

  for (const line of block.lines) {
    if (inTable || /<table\b/i.test(line)) {
      inTable = true;
      tableLines.push(line);
      if (/<\/table\s*>/i.test(line)) {
        revisions.push(...toRevisionRecords(extractTable(tableLines, tableLines.length - 1)));
        inTable = false;
        tableLines = [];
      }
      continue;
    }

    if (line.includes('Table of Contents')) {
      inToc = true;
      continue;
    }

    const tocEntry = parseTocEntry(line);
    if (tocEntry) {
      inToc = true;
      toc.push(tocEntry);
      continue;
    }

    if (inToc && line.startsWith('[')) {
      // Continuation of a TOC entry we could not read
      continue;
    }
    inToc = false;

    const versionAt = line.indexOf(VERSION_PREFIX);
    if (!version && versionAt !== -1) {
      version = stripMarkup(line.slice(versionAt + VERSION_PREFIX.length)).replace(/\*/g, '').trim();
      continue;
    }

    if (STRUCTURAL_MARKERS.includes(line[0])) {
      continue;
    }

    if (!published) {
      published = parseLongDate(line);
    }
  }

  if (!version || !published) {
    throw new IncompleteMetadataError('Introduction is missing Version and/or Publication Date.');
  }

  return {
    metadata: { title, version, published, revisions },
    toc
  };
}

/**
 * Advisory name -> number lookup. Later duplicates don't replace earlier ones.
 */
export function buildTocLookup(entries: TocEntry[]): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const entry of entries) {
    if (!lookup.has(entry.name)) {
      lookup.set(entry.name, entry.number);
    }
  }
  return lookup;
}
