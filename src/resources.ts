import { randomUUID } from 'node:crypto';
import { findTableEnd, locateTable } from './table.js';
import { Resource } from './types.js';

export type IdGenerator = () => string;

// Everything before the first "http" is the description, the rest is the link
const DESCRIPTION_LINK_PATTERN = /^(.*?)(http.*)$/s;

/**
 * Split a "description url" cell. Returns null when there is no link.
 */
export function splitDescriptionLink(cell: string): { description: string; href: string } | null {
  const match = cell.match(DESCRIPTION_LINK_PATTERN);
  if (!match) return null;
  return { description: match[1].trim(), href: match[2].trim() };
}

/**
 * Read the bibliography table from a References block.
 * Column 0 is the title, column 1 the description followed by the link.
 */
export function parseResources(lines: string[], generateId: IdGenerator = randomUUID): Resource[] {
  const resources: Resource[] = [];

  let end = findTableEnd(lines);
  while (end !== -1) {
    const table = locateTable(lines, end);
    const rows = table.hasHeader ? table.rows.slice(1) : table.rows;

    for (const row of rows) {
      if (row.length < 2) continue;

      const described = splitDescriptionLink(row[1]);
      if (!described) continue;

      resources.push({
        id: generateId(),
        title: row[0],
        description: described.description,
        link: { href: described.href }
      });
    }

    end = findTableEnd(lines, end + 1);
  }

  return resources;
}
