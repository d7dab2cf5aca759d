import { MalformedInputError } from './errors.js';
import { MAX_DEPTH, OutlinePosition } from './outline.js';
import { parseHeader } from './segmenter.js';
import { extractTable } from './table.js';
import { decodeEntities, slugify, stripMarkup } from './text.js';
import { Block, ControlNode, GroupNode, PartNode } from './types.js';

/**
 * Hands out identifiers, suffixing "-2", "-3", ... on collision.
 */
export class IdRegistry {
  private readonly used = new Set<string>();

  claim(base: string): string {
    let id = base;
    for (let n = 2; this.used.has(id); n++) {
      id = `${base}-${n}`;
    }
    this.used.add(id);
    return id;
  }
}

/**
 * Group under construction. Children are arena indices.
 */
interface GroupRecord {
  id: string;
  title: string;
  children: number[];
  controls?: ControlNode[];
}

/**
 * Turn section body lines into statement parts: one per prose line,
 * one per table row (cells joined with " | ").
 */
export function buildParts(lines: string[], controlId: string): PartNode[] {
  const prose: string[] = [];
  let tableLines: string[] = [];
  let inTable = false;

  const flushTable = () => {
    for (const row of extractTable(tableLines, tableLines.length - 1)) {
      if (row.some(cell => cell.length > 0)) {
        prose.push(row.join(' | '));
      }
    }
    tableLines = [];
    inTable = false;
  };

  for (const line of lines) {
    if (inTable || /<table\b/i.test(line)) {
      inTable = true;
      tableLines.push(line);
      if (/<\/table\s*>/i.test(line)) {
        flushTable();
      }
      continue;
    }

    const text = decodeEntities(stripMarkup(line)).trim();
    if (text) {
      prose.push(text);
    }
  }

  if (inTable) {
    flushTable();
  }

  return prose.map((statement, i) => ({
    id: `${controlId}_smt.${i + 1}`,
    name: 'statement',
    prose: statement
  }));
}

/**
 * Threads content sections into the group tree.
 *
 * Groups live in an arena and the parent stack holds arena indices, one per
 * open depth. A header deeper than one level below the current leaf is
 * clamped to that level and reported as a warning.
 */
export class TreeBuilder {
  private readonly arena: GroupRecord[] = [];
  private readonly stack: number[] = [];
  private readonly roots: number[] = [];

  constructor(
    private readonly outline: OutlinePosition,
    private readonly ids: IdRegistry,
    private readonly warnings: string[]
  ) {}

  addSection(block: Block): void {
    const header = block.header === null ? null : parseHeader(block.header);
    if (!header) {
      throw new MalformedInputError('Section block has no header', block.startLine || undefined);
    }
    if (header.depth > MAX_DEPTH) {
      throw new MalformedInputError(`Header depth ${header.depth} exceeds ${MAX_DEPTH}`, block.startLine);
    }
    if (!header.text) {
      this.warnings.push(`line ${block.startLine}: skipped section with an empty title`);
      return;
    }

    let depth = header.depth;
    const deepest = this.stack.length + 1;
    if (depth > deepest) {
      this.warnings.push(
        `line ${block.startLine}: "${header.text}" jumps from depth ${this.stack.length} to ${depth}; placed at depth ${deepest}`
      );
      depth = deepest;
    }

    const ordinal = this.outline.advance(depth);
    const slug = slugify(header.text);
    const title = `${ordinal} ${header.text}`;
    const id = this.ids.claim(`group-${ordinal}-${slug}`);
    const index = this.push({ id, title, children: [] });

    if (block.lines.length > 0) {
      const controlId = this.ids.claim(`ctrl-${ordinal}-${slug}`);
      const parts = buildParts(block.lines, controlId);
      if (parts.length > 0) {
        const controlsIndex = this.push({
          id: this.ids.claim(id.replace(/^group/, 'control')),
          title: `${title} Controls`,
          children: [],
          controls: [{ id: controlId, title, parts }]
        });
        this.arena[index].children.push(controlsIndex);
      }
    }

    this.place(depth, index);
  }

  /** Materialize the arena into nested groups */
  build(): GroupNode[] {
    return this.roots.map(index => this.toNode(index));
  }

  private push(record: GroupRecord): number {
    this.arena.push(record);
    return this.arena.length - 1;
  }

  private place(depth: number, index: number): void {
    if (depth === 1) {
      this.stack.length = 0;
      this.stack.push(index);
      this.roots.push(index);
      return;
    }

    if (depth > this.stack.length) {
      this.stack.push(index);
    } else {
      // Same depth replaces the leaf; shallower unwinds first
      this.stack.length = depth;
      this.stack[depth - 1] = index;
    }

    this.arena[this.stack[depth - 2]].children.push(index);
  }

  private toNode(index: number): GroupNode {
    const record = this.arena[index];
    const node: GroupNode = { id: record.id, title: record.title };
    if (record.children.length > 0) {
      node.groups = record.children.map(child => this.toNode(child));
    }
    if (record.controls) {
      node.controls = record.controls;
    }
    return node;
  }
}
