import { Parser } from 'htmlparser2';

/**
 * Table extraction for the raw HTML tables embedded in converted policy text.
 *
 * htmlparser2 tokenizes the markup and decodes entities. Its tag events drive
 * a small state machine through a handler table keyed on
 * (state, tag kind, open/close). Text only matters inside a cell.
 */

export type TableState = 'outside' | 'row' | 'cell';

type TagKind = 'row' | 'cell' | 'other';

export interface ParsedTable {
  rows: string[][];
  /** The first row is a header: all <th> cells, or inside <thead> */
  hasHeader: boolean;
}

interface TableContext {
  rows: string[][];
  headerFlags: boolean[];
  row: string[];
  cell: string;
  inHead: boolean;
  headCells: number;
  dataCells: number;
}

type TagHandler = (ctx: TableContext, name: string) => TableState;

const ROW_TAGS = new Set(['tr']);
const CELL_TAGS = new Set(['td', 'th']);
const SECTION_TAGS = new Set(['thead', 'tbody', 'tfoot']);

function tagKind(name: string): TagKind {
  if (ROW_TAGS.has(name)) return 'row';
  if (CELL_TAGS.has(name)) return 'cell';
  return 'other';
}

function startRow(ctx: TableContext): TableState {
  ctx.row = [];
  ctx.cell = '';
  ctx.headCells = 0;
  ctx.dataCells = 0;
  return 'row';
}

function startCell(ctx: TableContext, name: string): TableState {
  ctx.cell = '';
  if (name === 'th') {
    ctx.headCells++;
  } else {
    ctx.dataCells++;
  }
  return 'cell';
}

function finishCell(ctx: TableContext): TableState {
  ctx.row.push(ctx.cell.replace(/\s+/g, ' ').trim());
  ctx.cell = '';
  return 'row';
}

function finishRow(ctx: TableContext): TableState {
  ctx.rows.push(ctx.row);
  ctx.headerFlags.push(ctx.inHead || (ctx.headCells > 0 && ctx.dataCells === 0));
  ctx.row = [];
  ctx.cell = '';
  return 'outside';
}

/**
 * (state, tag kind, open|close) -> handler. Missing entries leave the state unchanged.
 */
const TAG_HANDLERS: Record<string, TagHandler> = {
  'outside:row:open': startRow,
  'row:row:open': startRow,       // previous row never closed, drop it
  'cell:row:open': startRow,
  'row:cell:open': startCell,
  'cell:cell:open': startCell,     // previous cell never closed, drop it
  'cell:cell:close': finishCell,
  'cell:row:close': finishRow,     // open cell is dropped
  'row:row:close': finishRow,
  'cell:other:close': ctx => {
    // Separate inline-styled fragments
    ctx.cell += ' ';
    return 'cell';
  }
};

/**
 * Run the state machine over markup holding one table.
 */
export function readTable(markup: string): ParsedTable {
  const ctx: TableContext = {
    rows: [],
    headerFlags: [],
    row: [],
    cell: '',
    inHead: false,
    headCells: 0,
    dataCells: 0
  };
  let state: TableState = 'outside';

  const dispatch = (name: string, closing: boolean) => {
    const handler = TAG_HANDLERS[`${state}:${tagKind(name)}:${closing ? 'close' : 'open'}`];
    if (handler) {
      state = handler(ctx, name);
    }
  };

  const parser = new Parser(
    {
      onopentag: name => {
        if (SECTION_TAGS.has(name)) {
          ctx.inHead = name === 'thead';
          return;
        }
        dispatch(name, false);
      },
      onclosetag: (name, isImplied) => {
        if (SECTION_TAGS.has(name)) {
          ctx.inHead = false;
          return;
        }
        // Unclosed rows and cells are dropped, not closed for us
        if (isImplied) return;
        dispatch(name, true);
      },
      ontext: text => {
        if (state === 'cell') {
          ctx.cell += text;
        }
      }
    },
    { decodeEntities: true }
  );
  parser.write(markup);
  parser.end();

  return { rows: ctx.rows, hasHeader: ctx.headerFlags[0] ?? false };
}

export function parseTableMarkup(markup: string): string[][] {
  return readTable(markup).rows;
}

/**
 * Find the line that opens the table closing at or before `endIndex`.
 * Returns 0 when no opening tag is found.
 */
export function findTableStart(lines: string[], endIndex: number): number {
  for (let i = Math.min(endIndex, lines.length - 1); i >= 0; i--) {
    if (/<table\b/i.test(lines[i])) {
      return i;
    }
  }
  return 0;
}

/**
 * Index of the first line at or after `from` that closes a table, or -1.
 */
export function findTableEnd(lines: string[], from = 0): number {
  for (let i = from; i < lines.length; i++) {
    if (/<\/table\s*>/i.test(lines[i])) {
      return i;
    }
  }
  return -1;
}

/**
 * Read the table whose closing tag is at (or just before) `endIndex`.
 */
export function locateTable(lines: string[], endIndex: number): ParsedTable {
  if (lines.length === 0) {
    return { rows: [], hasHeader: false };
  }
  const end = Math.min(endIndex, lines.length - 1);
  const start = findTableStart(lines, end);
  return readTable(lines.slice(start, end + 1).join('\n'));
}

/**
 * Rows of the table closing at `endIndex`. The header row is included;
 * callers that need to skip it use `locateTable`.
 */
export function extractTable(lines: string[], endIndex: number): string[][] {
  return locateTable(lines, endIndex).rows;
}
