/**
 * A header-anchored run of lines produced by the segmenter.
 * The front-matter block is the only one whose `header` may be null.
 */
export interface Block {
  /** The raw header line, or null for the leading front-matter block */
  header: string | null;

  /** Non-blank lines following the header, in document order */
  lines: string[];

  /** Line number of the header (1-based), or 0 for front matter */
  startLine: number;
}

/**
 * Closed set of block classifications, computed once per block.
 */
export type BlockKind = 'front-matter' | 'table-of-contents' | 'bibliography' | 'content';

export interface ClassifiedBlock {
  kind: BlockKind;
  block: Block;
}

/**
 * An atomic prose statement attached to a control.
 */
export interface PartNode {
  id: string;

  /** Part name tag, e.g. "statement" */
  name: string;

  /** Prose text; table rows are joined with " | " */
  prose: string;
}

/**
 * A leaf requirement node.
 */
export interface ControlNode {
  id: string;
  title: string;
  parts: PartNode[];
}

/**
 * An outline node. Holds child groups, or controls, never both directly:
 * a section with body content gets a synthetic "... Controls" child group.
 */
export interface GroupNode {
  id: string;

  /** Ordinal-prefixed display title, e.g. "1.2 Scope" */
  title: string;

  groups?: GroupNode[];
  controls?: ControlNode[];
}

export interface ResourceLink {
  href: string;
}

/**
 * A bibliographic entry. Entries without a link are never emitted.
 */
export interface Resource {
  id: string;
  title: string;
  description: string;
  link: ResourceLink;
}

export interface RevisionRecord {
  version: string;
  published: Date;
  remarks: string;
}

/**
 * An entry from the front-matter table of contents. Advisory only.
 */
export interface TocEntry {
  number: string;
  name: string;
}

export interface PolicyMetadata {
  title: string;
  version: string;
  published: Date;
  revisions: RevisionRecord[];
}

/**
 * Result of parsing one policy document.
 */
export interface ParsedPolicy {
  metadata: PolicyMetadata;

  /** Top-level outline groups in document order */
  groups: GroupNode[];

  resources: Resource[];

  /** Table of contents entries found in the front matter */
  toc: TocEntry[];

  /** Recoverable anomalies noticed while parsing */
  warnings: string[];
}
