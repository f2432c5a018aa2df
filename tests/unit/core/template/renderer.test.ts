import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { nestContext, renderTemplate, wrapSection } from '../../../../src/core/template/renderer.ts';

describe('nestContext', () => {
  it('splits dotted keys into nested objects', () => {
    assert.deepEqual(nestContext({ 'PROJECT.NAME': 'demo', 'PROJECT.TYPE': 'lib', 'WITH.TESTS': true }), {
      PROJECT: { NAME: 'demo', TYPE: 'lib' },
      WITH: { TESTS: true },
    });
  });

  it('lets later keys replace earlier ones', () => {
    assert.deepEqual(nestContext({ A: 'plain', 'A.B': 'x' }), { A: { B: 'x' } });
    assert.deepEqual(nestContext({ 'A.B': 'x', A: 'plain' }), { A: 'plain' });
  });
});

describe('renderTemplate', () => {
  it('resolves dotted names without escaping', () => {
    const context = { 'PROJECT.NAME': 'demo', 'PROJECT.EMAIL': 'dev@example.com' };
    assert.equal(renderTemplate('{{PROJECT.NAME}} <{{PROJECT.EMAIL}}>', context), 'demo <dev@example.com>');
    assert.equal(renderTemplate('{{VALUE}}', { VALUE: 'a && b' }), 'a && b');
  });

  it('renders sections from booleans', () => {
    const template = '{{#WITH.TESTS}}tests{{/WITH.TESTS}}{{^WITH.TESTS}}none{{/WITH.TESTS}}';
    assert.equal(renderTemplate(template, { 'WITH.TESTS': true }), 'tests');
    assert.equal(renderTemplate(template, { 'WITH.TESTS': false }), 'none');
  });

  it('renders missing keys as empty', () => {
    assert.equal(renderTemplate('[{{MISSING}}]', {}), '[]');
  });
});

describe('wrapSection', () => {
  it('returns the body without a condition', () => {
    assert.equal(wrapSection('a.txt\n', undefined), 'a.txt\n');
  });

  it('wraps the body in standalone section lines', () => {
    const wrapped = wrapSection('a.txt\n', 'WITH.DOCS');
    assert.equal(wrapped, '{{#WITH.DOCS}}\na.txt\n{{/WITH.DOCS}}\n');
    assert.equal(renderTemplate(wrapped, { 'WITH.DOCS': true }), 'a.txt\n');
    assert.equal(renderTemplate(wrapped, { 'WITH.DOCS': false }), '');
  });
});
