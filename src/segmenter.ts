import { Block, BlockKind, ClassifiedBlock } from './types.js';
import { decodeEntities, stripMarkup } from './text.js';

// Group 1: the marker run (depth), group 2: header text
const HEADER_PATTERN = /^(#+)(.*)$/;

export interface Header {
  depth: number;
  /** Header text with markup stripped and whitespace trimmed */
  text: string;
}

/**
 * Parse a header line. Returns null when the line is not a header.
 */
export function parseHeader(line: string): Header | null {
  const match = line.match(HEADER_PATTERN);
  if (!match) return null;

  return {
    depth: match[1].length,
    text: decodeEntities(stripMarkup(match[2])).trim()
  };
}

/**
 * Split input lines into header-anchored blocks.
 *
 * Blank lines are dropped. The first block holds whatever precedes the first
 * header and is always present, even when empty.
 */
export function segmentLines(lines: string[]): Block[] {
  const blocks: Block[] = [];
  let current: Block = { header: null, lines: [], startLine: 0 };
  blocks.push(current);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim().length === 0) {
      continue;
    }

    if (line.startsWith('#')) {
      current = { header: line, lines: [], startLine: i + 1 };
      blocks.push(current);
    } else {
      current.lines.push(line);
    }
  }

  return blocks;
}

/**
 * Classify a header block by its header text.
 */
export function classifyHeader(header: string): BlockKind {
  if (header.includes('Table of Contents')) return 'table-of-contents';
  if (header.includes('References') || header.includes('Bibliography')) return 'bibliography';
  return 'content';
}

/**
 * Classify every block once.
 *
 * The leading block is front matter when it has content. When it is empty
 * and the document opens with a header, that first header block carries the
 * front matter instead (title header followed by version and date lines).
 */
export function classifyBlocks(blocks: Block[]): ClassifiedBlock[] {
  const classified: ClassifiedBlock[] = [];
  if (blocks.length === 0) {
    return classified;
  }

  const [leading, ...rest] = blocks;
  let sections = rest;

  if (leading.lines.length > 0 || rest.length === 0) {
    classified.push({ kind: 'front-matter', block: leading });
  } else {
    const [first, ...others] = rest;
    classified.push({ kind: 'front-matter', block: first });
    sections = others;
  }

  for (const block of sections) {
    // A block built outside the segmenter may lack a header; the tree builder rejects it
    const kind = block.header === null ? 'content' : classifyHeader(block.header);
    classified.push({ kind, block });
  }

  return classified;
}
