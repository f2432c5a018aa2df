import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  MarkdownChangelog,
  formatCommitMessage,
  insertChangelogSection,
  renderChangelogSection,
} from '../../../../src/core/release/changelog.ts';
import { noHosting } from '../../../../src/adapters/github/index.ts';
import { tagName } from '../../../../src/types/branded.ts';
import type { Hosting, ReleaseSetup } from '../../../../src/types/release.ts';
import { changelogOf, createFakeHosting, entry } from '../../../mocks/release.ts';
import { createTestRuntime } from '../../../mocks/runtime.ts';

const changelog = changelogOf({
  breaking: [
    { hash: 'aaaaaaa111', scope: null, summary: 'drop legacy api', breakingNote: 'the old entry points are gone' },
  ],
  feat: [entry('bbbbbbb222', 'add widgets', 'core')],
  fix: [entry('ccccccc333', 'handle empty input')],
});

const releaseSetup = (hosting: Hosting = createFakeHosting()): ReleaseSetup => ({
  hosting,
  prevTag: tagName('v1.0.0'),
  currTag: tagName('v1.1.0'),
  takeAll: false,
});

const date = new Date('2026-03-04T12:00:00Z');

describe('formatCommitMessage', () => {
  it('returns an empty string when there is nothing to list', () => {
    assert.equal(formatCommitMessage(changelogOf()), '');
  });

  it('lists each non-empty group after a blank line', () => {
    assert.equal(
      formatCommitMessage(changelog),
      [
        '',
        '',
        'Breaking Changes:',
        '- the old entry points are gone',
        '',
        'New Features:',
        '- core: add widgets',
        '',
        'Bug Fixes:',
        '- handle empty input',
      ].join('\n'),
    );
  });
});

describe('renderChangelogSection', () => {
  it('links the heading to the comparison and each entry to its commit', () => {
    assert.equal(
      renderChangelogSection(changelog, releaseSetup(), date),
      [
        '## [1.1.0](https://example.test/compare/v1.0.0...v1.1.0) (2026-03-04)',
        '',
        '### Breaking Changes',
        '',
        '- the old entry points are gone ([aaaaaaa](https://example.test/commit/aaaaaaa111))',
        '',
        '### New Features',
        '',
        '- **core:** add widgets ([bbbbbbb](https://example.test/commit/bbbbbbb222))',
        '',
        '### Bug Fixes',
        '',
        '- handle empty input ([ccccccc](https://example.test/commit/ccccccc333))',
        '',
      ].join('\n'),
    );
  });

  it('renders plain text without a hosting service', () => {
    const section = renderChangelogSection(changelogOf({ fix: [entry('ddd', 'tidy up')] }), releaseSetup(noHosting), date);
    assert.equal(section, '## 1.1.0 (2026-03-04)\n\n### Bug Fixes\n\n- tidy up\n');
  });

  it('renders only the heading when no change is listed', () => {
    assert.equal(renderChangelogSection(changelogOf(), releaseSetup(noHosting), date), '## 1.1.0 (2026-03-04)\n');
  });
});

describe('insertChangelogSection', () => {
  const section = '## 1.0.0 (2026-03-04)\n';

  it('creates the title for a new file', () => {
    assert.equal(insertChangelogSection('', section), '# Changelog\n\n## 1.0.0 (2026-03-04)\n');
  });

  it('puts the newest section right under the title', () => {
    assert.equal(
      insertChangelogSection('# Changelog\n\n## 0.9.0 (2026-01-01)\n', section),
      '# Changelog\n\n## 1.0.0 (2026-03-04)\n\n## 0.9.0 (2026-01-01)\n',
    );
  });

  it('keeps text that precedes the title', () => {
    assert.equal(
      insertChangelogSection('Intro\n# Changelog\n\n## 0.9.0\n', section),
      'Intro\n# Changelog\n\n## 1.0.0 (2026-03-04)\n\n## 0.9.0\n',
    );
  });

  it('adds a title above existing text without one', () => {
    assert.equal(
      insertChangelogSection('Old notes\n', section),
      '# Changelog\n\n## 1.0.0 (2026-03-04)\n\nOld notes\n',
    );
  });
});

describe('MarkdownChangelog', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'changelog-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('writes the section into the configured file', async () => {
    const writer = new MarkdownChangelog(tmpDir, 'CHANGES.md', () => date);
    const { rt } = createTestRuntime();

    await writer.updateChangelog(changelogOf({ feat: [entry('eee', 'first feature')] }), releaseSetup(noHosting), rt);
    await writer.updateChangelog(changelogOf({ fix: [entry('fff', 'first fix')] }), releaseSetup(noHosting), rt);

    const content = await fs.readFile(path.join(tmpDir, 'CHANGES.md'), 'utf-8');
    assert.equal(
      content,
      [
        '# Changelog',
        '',
        '## 1.1.0 (2026-03-04)',
        '',
        '### Bug Fixes',
        '',
        '- first fix',
        '',
        '## 1.1.0 (2026-03-04)',
        '',
        '### New Features',
        '',
        '- first feature',
        '',
      ].join('\n'),
    );
  });
});
