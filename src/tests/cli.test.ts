import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { main, parseArgs } from '../cli.js';

const { describe, it, beforeEach, afterEach, mock } = test;

describe('parseArgs', () => {

  it('should read the filename and options', () => {
    assert.deepStrictEqual(parseArgs(['policy.md', '--out=catalog.json', '--title=Test Policy']), {
      filename: 'policy.md',
      out: 'catalog.json',
      title: 'Test Policy'
    });
  });

  it('should read --config', () => {
    assert.deepStrictEqual(parseArgs(['policy.md', '--config=cfg.json']), {
      filename: 'policy.md',
      config: 'cfg.json'
    });
  });

  it('should ignore unknown flags and extra positionals', () => {
    assert.deepStrictEqual(parseArgs(['--verbose', 'a.md', 'b.md']), { filename: 'a.md' });
  });
});

describe('main', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'policy-catalog-cli-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write catalog JSON to --out', async () => {
    const input = path.join(tempDir, 'policy.md');
    const output = path.join(tempDir, 'out', 'catalog.json');
    fs.writeFileSync(input, 'Version 1.0\nJanuary 1, 2020\n# Scope\nThis is the scope.\n');

    const code = await main([input, `--out=${output}`, '--title=Test Policy']);

    assert.strictEqual(code, 0);
    const written = JSON.parse(fs.readFileSync(output, 'utf-8'));
    assert.strictEqual(written.catalog.metadata.title, 'Test Policy');
    assert.strictEqual(written.catalog.metadata.version, '1.0');
    assert.strictEqual(written.catalog.groups[0].title, '1 Scope');
  });

  it('should write only catalog JSON to stdout when a config file is loaded', async () => {
    const input = path.join(tempDir, 'policy.md');
    const configFile = path.join(tempDir, 'policy-catalog.config.json');
    fs.writeFileSync(input, 'Version 1.0\nJanuary 1, 2020\n# Scope\nThis is the scope.\n');
    fs.writeFileSync(configFile, JSON.stringify({ title: 'Configured Policy' }));

    let stdout = '';
    const write = mock.method(process.stdout, 'write', (chunk: string | Uint8Array) => {
      stdout += String(chunk);
      return true;
    });

    let code: number;
    try {
      code = await main([input, `--config=${configFile}`]);
    } finally {
      write.mock.restore();
    }

    assert.strictEqual(code, 0);
    const catalog = JSON.parse(stdout);
    assert.strictEqual(catalog.catalog.metadata.title, 'Configured Policy');
    assert.strictEqual(catalog.catalog.groups[0].title, '1 Scope');
  });

  it('should fail for a missing file', async () => {
    assert.strictEqual(await main([path.join(tempDir, 'missing.md')]), 1);
    assert.strictEqual(await main([]), 1);
  });

  it('should fail for a directory', async () => {
    assert.strictEqual(await main([tempDir]), 1);
  });

  it('should fail on a parse error', async () => {
    const input = path.join(tempDir, 'policy.md');
    fs.writeFileSync(input, '# Scope\nNo metadata\n');

    assert.strictEqual(await main([input]), 1);
  });
});
