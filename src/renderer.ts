import { Marked } from 'marked';
import { buildTocLookup } from './metadata.js';
import { GroupNode, ParsedPolicy } from './types.js';

/**
 * Options for rendering a parsed policy
 */
export interface RenderOptions {
  /** Append the bibliography as a link list (default: true) */
  includeResources?: boolean;
}

/**
 * Result of rendering a policy
 */
export interface RenderResult {
  /** The rendered HTML */
  html: string;
  /** One entry per outline group */
  toc: OutlineEntry[];
}

/**
 * A table of contents entry
 */
export interface OutlineEntry {
  /** Nesting level (1-based) */
  level: number;
  /** Group display title */
  text: string;
  /** Group identifier */
  id: string;
  /** Section number printed in the document's own table of contents, if listed */
  printedNumber?: string;
}

const MAX_HEADING_LEVEL = 6;

/**
 * Create a configured marked instance
 */
function createMarkedInstance(): Marked {
  return new Marked({
    gfm: true,      // GitHub Flavored Markdown
    breaks: false
  });
}

/**
 * Escape characters marked would read as inline markup
 */
function escapeMarkdown(text: string): string {
  return text.replace(/([\\`*_[\]<>#|])/g, '\\$1');
}

function isControlsGroup(group: GroupNode): boolean {
  return group.controls !== undefined && group.groups === undefined;
}

/**
 * Strip the outline ordinal from a display title ("2.1 Scope" -> "Scope")
 */
function bareTitle(title: string): string {
  return title.replace(/^\S+\s+/, '');
}

function writeGroup(
  group: GroupNode,
  level: number,
  out: string[],
  toc: OutlineEntry[],
  lookup: Map<string, string>
): void {
  if (isControlsGroup(group)) {
    for (const control of group.controls ?? []) {
      for (const part of control.parts) {
        out.push(escapeMarkdown(part.prose), '');
      }
    }
    return;
  }

  const entry: OutlineEntry = { level, text: group.title, id: group.id };
  const printedNumber = lookup.get(bareTitle(group.title));
  if (printedNumber) {
    entry.printedNumber = printedNumber;
  }
  toc.push(entry);

  out.push(`${'#'.repeat(Math.min(level, MAX_HEADING_LEVEL))} ${escapeMarkdown(group.title)}`, '');
  for (const child of group.groups ?? []) {
    writeGroup(child, level + 1, out, toc, lookup);
  }
}

/**
 * Rebuild a Markdown view of the parsed outline.
 */
export function toMarkdown(parsed: ParsedPolicy, options: RenderOptions = {}): { markdown: string; toc: OutlineEntry[] } {
  const { includeResources = true } = options;
  const out: string[] = [];
  const toc: OutlineEntry[] = [];
  const lookup = buildTocLookup(parsed.toc);

  for (const group of parsed.groups) {
    writeGroup(group, 1, out, toc, lookup);
  }

  if (includeResources && parsed.resources.length > 0) {
    out.push('# References', '');
    for (const resource of parsed.resources) {
      const description = resource.description ? ` ${escapeMarkdown(resource.description)}` : '';
      out.push(`- [${escapeMarkdown(resource.title)}](${resource.link.href})${description}`);
    }
    out.push('');
  }

  return { markdown: out.join('\n'), toc };
}

/**
 * Render a parsed policy to HTML
 */
export function renderPolicy(parsed: ParsedPolicy, options: RenderOptions = {}): RenderResult {
  const { markdown, toc } = toMarkdown(parsed, options);
  const html = createMarkedInstance().parse(markdown, { async: false });
  if (typeof html !== 'string') {
    throw new Error('Markdown rendering unexpectedly returned a promise');
  }
  return { html, toc };
}
