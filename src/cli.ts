#!/usr/bin/env node
/**
 * cli.ts - Converts a tokenized policy document into catalog JSON
 *
 * Usage: policy-catalog <filename> [--out=<path>] [--title=<text>] [--config=<path>]
 * Output: catalog JSON on stdout, or written to --out
 */

import fs from 'fs-extra';
import { pathToFileURL } from 'node:url';
import { toCatalog } from './catalog.js';
import { loadConfig } from './config.js';
import { PolicyParseError } from './errors.js';
import { loadPolicyFile } from './loader.js';

const USAGE = 'Usage: policy-catalog <filename> [--out=<path>] [--title=<text>] [--config=<path>]';

export interface CliArgs {
  filename?: string;
  out?: string;
  title?: string;
  config?: string;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {};
  for (const arg of args) {
    if (arg.startsWith('--out=')) {
      result.out = arg.slice('--out='.length);
    } else if (arg.startsWith('--title=')) {
      result.title = arg.slice('--title='.length);
    } else if (arg.startsWith('--config=')) {
      result.config = arg.slice('--config='.length);
    } else if (!arg.startsWith('--') && result.filename === undefined) {
      result.filename = arg;
    }
  }
  return result;
}

/**
 * Run the converter. Returns the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);

  if (!args.filename || !(await fs.pathExists(args.filename)) || !(await fs.stat(args.filename)).isFile()) {
    console.error('You provided an argument that does not exist or is not a file.');
    console.error(USAGE);
    return 1;
  }

  const config = await loadConfig(args.config);

  try {
    const parsed = loadPolicyFile(args.filename, { title: args.title ?? config.title });
    for (const warning of parsed.warnings) {
      console.warn(`warning: ${warning}`);
    }

    const catalog = toCatalog(parsed, { oscalVersion: config.oscalVersion });
    if (args.out) {
      await fs.outputJson(args.out, catalog, { spaces: 2 });
      console.error(`Wrote ${args.out}`);
    } else {
      process.stdout.write(`${JSON.stringify(catalog, null, 2)}\n`);
    }
    return 0;
  } catch (err) {
    if (err instanceof PolicyParseError) {
      console.error(`error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

// Resolve the npm bin symlink before comparing
if (process.argv[1] && import.meta.url === pathToFileURL(fs.realpathSync(process.argv[1])).href) {
  main(process.argv.slice(2)).then(code => {
    process.exitCode = code;
  }).catch(err => {
    console.error(err);
    process.exitCode = 1;
  });
}
