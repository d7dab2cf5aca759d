import * as fs from 'node:fs';
import * as path from 'node:path';
import { ParseOptions, parsePolicy } from './parser.js';
import { ParsedPolicy } from './types.js';

/**
 * Options for loading policy documents
 */
export interface LoadOptions {
  /** Directory to scan for .md and .txt files */
  contentDir: string;
  parseOptions?: ParseOptions;
}

/**
 * Result of loading all policy documents
 */
export interface LoadResult {
  /** Parsed documents by document ID (file name) */
  documents: Map<string, ParsedPolicy>;
  /** Raw content of every file that could be read */
  corpus: Map<string, string>;
  /** Read failures, fatal parse errors and parse warnings, prefixed by document ID */
  errors: string[];
}

const POLICY_EXTENSIONS = new Set(['.md', '.txt']);

/**
 * Find all policy files in a directory (non-recursive)
 */
function findPolicyFiles(dir: string, errors: string[]): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    // Not a directory, or not readable
    errors.push(`Failed to read content directory ${dir}: ${err instanceof Error ? err.message : String(err)}`);
    return [];
  }

  return entries
    .filter(entry => entry.isFile() && POLICY_EXTENSIONS.has(path.extname(entry.name).toLowerCase()))
    .map(entry => path.join(dir, entry.name))
    .sort();
}

/**
 * Read and parse a single policy file. Parse errors propagate.
 */
export function loadPolicyFile(filePath: string, parseOptions: ParseOptions = {}): ParsedPolicy {
  const content = fs.readFileSync(filePath, 'utf-8');
  return parsePolicy(content, parseOptions);
}

/**
 * Load and parse all policy files from a directory
 */
export function loadPolicies(options: LoadOptions): LoadResult {
  const { contentDir, parseOptions = {} } = options;

  const documents = new Map<string, ParsedPolicy>();
  const corpus = new Map<string, string>();
  const errors: string[] = [];

  for (const filePath of findPolicyFiles(contentDir, errors)) {
    const documentId = path.basename(filePath);

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      errors.push(`Failed to read ${documentId}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }
    corpus.set(documentId, content);

    try {
      const result = parsePolicy(content, parseOptions);
      documents.set(documentId, result);

      for (const warning of result.warnings) {
        errors.push(`${documentId}: ${warning}`);
      }
    } catch (err) {
      errors.push(`Failed to parse ${documentId}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return { documents, corpus, errors };
}
