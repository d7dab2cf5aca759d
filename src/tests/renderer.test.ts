import * as test from 'node:test';
import * as assert from 'node:assert';
import { parsePolicy } from '../parser.js';
import { renderPolicy, toMarkdown } from '../renderer.js';
import { ParsedPolicy } from '../types.js';

const SCOPE_DOCUMENT = 'Version 1.0\nJanuary 1, 2020\n# Scope\nThis is the scope.\n## Applicability\nApplies broadly.';

function policyWithProse(prose: string): ParsedPolicy {
  return {
    metadata: { title: 'Test Policy', version: '1', published: new Date(2020, 0, 1), revisions: [] },
    groups: [
      {
        id: 'group-1-a',
        title: '1 A',
        groups: [
          {
            id: 'control-1-a',
            title: '1 A Controls',
            controls: [{ id: 'ctrl-1-a', title: '1 A', parts: [{ id: 'ctrl-1-a_smt.1', name: 'statement', prose }] }]
          }
        ]
      }
    ],
    resources: [
      { id: 'res-1', title: 'Guide', description: 'Setup guide', link: { href: 'http://example.org/guide' } }
    ],
    toc: [],
    warnings: []
  };
}

test.describe('toMarkdown', () => {

  test.it('should nest headings and write parts as paragraphs', () => {
    const { markdown } = toMarkdown(parsePolicy(SCOPE_DOCUMENT));
    assert.strictEqual(markdown, '# 1 Scope\n\nThis is the scope.\n\n## 2 Applicability\n\nApplies broadly.\n');
  });
});

test.describe('renderPolicy', () => {

  test.it('should render headings and prose', () => {
    const { html } = renderPolicy(parsePolicy(SCOPE_DOCUMENT));
    assert.ok(html.includes('<h1>1 Scope</h1>'));
    assert.ok(html.includes('<p>This is the scope.</p>'));
    assert.ok(html.includes('<h2>2 Applicability</h2>'));
    assert.ok(html.includes('<p>Applies broadly.</p>'));
  });

  test.it('should list one table of contents entry per outline group', () => {
    const { toc } = renderPolicy(parsePolicy(SCOPE_DOCUMENT));
    assert.deepStrictEqual(toc, [
      { level: 1, text: '1 Scope', id: 'group-1-scope' },
      { level: 2, text: '2 Applicability', id: 'group-2-applicability' }
    ]);
  });

  test.it('should note the number printed in the document table of contents', () => {
    const parsed = parsePolicy('Version 1.0\nJanuary 1, 2020\n[4 Scope [4](#scope)]\n# Scope\nText.');
    const { toc } = renderPolicy(parsed);
    assert.deepStrictEqual(toc, [{ level: 1, text: '1 Scope', id: 'group-1-scope', printedNumber: '4' }]);
  });

  test.it('should escape prose that looks like markup', () => {
    const { html } = renderPolicy(policyWithProse('a*b*c'), { includeResources: false });
    assert.ok(html.includes('<p>a*b*c</p>'));
  });

  test.it('should render resources as links', () => {
    const { html } = renderPolicy(policyWithProse('text'));
    assert.ok(html.includes('<h1>References</h1>'));
    assert.ok(html.includes('<a href="http://example.org/guide">Guide</a> Setup guide'));
  });

  test.it('should leave resources out on request', () => {
    const { html } = renderPolicy(policyWithProse('text'), { includeResources: false });
    assert.ok(!html.includes('References'));
  });
});
