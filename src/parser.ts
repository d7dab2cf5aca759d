import { randomUUID } from 'node:crypto';
import { DEFAULT_TITLE, parseFrontMatter } from './metadata.js';
import { OutlinePosition } from './outline.js';
import { IdGenerator, parseResources } from './resources.js';
import { classifyBlocks, segmentLines } from './segmenter.js';
import { IdRegistry, TreeBuilder } from './tree-builder.js';
import { ParsedPolicy, Resource } from './types.js';

export interface ParseOptions {
  /** Catalog title; the front matter does not carry one */
  title?: string;
  /** Identifier source for resources (default: random UUIDs) */
  generateId?: IdGenerator;
}

/**
 * Parser context. Every piece of per-document state lives here and is
 * rebuilt at the start of each `parse` call.
 */
export class PolicyParser {
  private readonly title: string;
  private readonly generateId: IdGenerator;
  private readonly outline = new OutlinePosition();

  constructor(options: ParseOptions = {}) {
    this.title = options.title ?? DEFAULT_TITLE;
    this.generateId = options.generateId ?? randomUUID;
  }

  parse(lines: string[]): ParsedPolicy {
    this.outline.reset();
    const warnings: string[] = [];
    const builder = new TreeBuilder(this.outline, new IdRegistry(), warnings);
    const resources: Resource[] = [];

    const classified = classifyBlocks(segmentLines(lines));
    const [frontMatter, ...sections] = classified;
    const { metadata, toc } = parseFrontMatter(frontMatter.block, this.title);

    for (const { kind, block } of sections) {
      switch (kind) {
        case 'table-of-contents':
        case 'front-matter':
          break;
        case 'bibliography':
          resources.push(...parseResources(block.lines, this.generateId));
          break;
        case 'content':
          builder.addSection(block);
          break;
      }
    }

    return { metadata, groups: builder.build(), resources, toc, warnings };
  }
}

/**
 * Split raw text into lines, normalizing Windows and old Mac line endings.
 */
export function splitLines(content: string): string[] {
  return content.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
}

/**
 * Parse pre-split lines with a fresh parser.
 */
export function parse(lines: string[], options: ParseOptions = {}): ParsedPolicy {
  return new PolicyParser(options).parse(lines);
}

/**
 * Parse a whole policy document.
 */
export function parsePolicy(content: string, options: ParseOptions = {}): ParsedPolicy {
  return parse(splitLines(content), options);
}
