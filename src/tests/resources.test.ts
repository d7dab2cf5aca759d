import * as test from 'node:test';
import * as assert from 'node:assert';
import { parseResources, splitDescriptionLink } from '../resources.js';

const { describe, it } = test;

function sequentialIds(): () => string {
  let n = 0;
  return () => `res-${++n}`;
}

describe('splitDescriptionLink', () => {

  it('should split at the first http', () => {
    assert.deepStrictEqual(splitDescriptionLink('RFC 5280 profile https://example.org/rfc5280'), {
      description: 'RFC 5280 profile',
      href: 'https://example.org/rfc5280'
    });
  });

  it('should allow an empty description', () => {
    assert.deepStrictEqual(splitDescriptionLink('http://x'), { description: '', href: 'http://x' });
  });

  it('should return null without a link', () => {
    assert.strictEqual(splitDescriptionLink('no url here'), null);
  });
});

describe('parseResources', () => {

  it('should keep only rows with a link', () => {
    const resources = parseResources([
      '<table>',
      '<tr><td>Title</td><td>Desc http://x</td></tr>',
      '<tr><td>NoLink</td><td>no url here</td></tr>',
      '</table>'
    ], sequentialIds());

    assert.deepStrictEqual(resources, [
      { id: 'res-1', title: 'Title', description: 'Desc', link: { href: 'http://x' } }
    ]);
  });

  it('should drop the header row and rows with one cell', () => {
    const resources = parseResources([
      '<table>',
      '<tr><th>Title</th><th>Reference</th></tr>',
      '<tr><td>Lonely http://lonely</td></tr>',
      '<tr><td>Guide</td><td>Setup guide https://example.org/guide</td></tr>',
      '</table>'
    ], sequentialIds());

    assert.deepStrictEqual(resources.map(r => r.title), ['Guide']);
  });

  it('should drop a header row even when it mentions http', () => {
    const resources = parseResources([
      '<table>',
      '<tr><th>Title</th><th>Description and URL (http/https)</th></tr>',
      '<tr><td>A</td><td>first http://a</td></tr>',
      '</table>'
    ], sequentialIds());

    assert.deepStrictEqual(resources.map(r => r.title), ['A']);
  });

  it('should keep the first row of a table without a header', () => {
    const resources = parseResources([
      '<table>',
      '<tr><td>A</td><td>first http://a</td></tr>',
      '<tr><td>B</td><td>second http://b</td></tr>',
      '</table>'
    ], sequentialIds());

    assert.deepStrictEqual(resources.map(r => r.title), ['A', 'B']);
  });

  it('should read every table in the section', () => {
    const resources = parseResources([
      'Normative references',
      '<table>',
      '<tr><td>A</td><td>first http://a</td></tr>',
      '</table>',
      'Informative references',
      '<table>',
      '<tr><td>B</td><td>second http://b</td></tr>',
      '</table>'
    ], sequentialIds());

    assert.deepStrictEqual(resources.map(r => [r.id, r.title, r.link.href]), [
      ['res-1', 'A', 'http://a'],
      ['res-2', 'B', 'http://b']
    ]);
  });

  it('should return nothing when there is no table', () => {
    assert.deepStrictEqual(parseResources(['See the appendix.']), []);
  });

  it('should generate UUIDs by default', () => {
    const [resource] = parseResources(['<table>', '<tr><td>A</td><td>http://a</td></tr>', '</table>']);
    assert.match(resource.id, /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});
