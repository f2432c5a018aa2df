import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { simpleGit, type SimpleGit } from 'simple-git';
import {
  createSimpleGitRelease,
  getRemoteUrl,
  readGitConfig,
} from '../../../../src/adapters/vcs/simple-git-release.ts';
import { noHosting } from '../../../../src/adapters/github/index.ts';
import { tagName } from '../../../../src/types/branded.ts';
import { CommitLevel } from '../../../../src/types/release.ts';

describe('simple-git release adapter', () => {
  let repoDir: string;
  let git: SimpleGit;

  const commitFile = async (name: string, message: string) => {
    await fs.writeFile(path.join(repoDir, name), `${name}\n`, 'utf-8');
    await git.add(name);
    await git.commit(message);
  };

  beforeEach(async () => {
    repoDir = await fs.mkdtemp(path.join(os.tmpdir(), 'release-git-'));
    git = simpleGit(repoDir);
    await git.init();
    await git.addConfig('user.name', 'Test User');
    await git.addConfig('user.email', 'test@example.com');
    await git.addConfig('commit.gpgsign', 'false');
    await git.addConfig('tag.gpgsign', 'false');

    await commitFile('a.txt', 'feat: initial layout');
    await git.addAnnotatedTag('v1.0.0', 'release 1.0.0');
    await commitFile('b.txt', 'fix(core): handle empty input');
  });

  afterEach(async () => {
    await fs.rm(repoDir, { recursive: true, force: true });
  });

  it('lists tags', async () => {
    const release = createSimpleGitRelease(repoDir, { remote: 'origin' });
    const tags = await release.tagList();
    assert.ok(tags.ok);
    assert.deepEqual(tags.val, ['v1.0.0']);
  });

  it('reads the log since the previous tag', async () => {
    const release = createSimpleGitRelease(repoDir, { remote: 'origin' });
    const log = await release.getLog({
      hosting: noHosting,
      prevTag: tagName('v1.0.0'),
      currTag: null,
      takeAll: false,
    });

    assert.ok(log.ok);
    assert.equal(log.val.level, CommitLevel.FIX);
    assert.deepEqual(
      log.val.changelog.fix.map((e) => [e.scope, e.summary]),
      [['core', 'handle empty input']],
    );
    assert.deepEqual(log.val.changelog.feat, []);
  });

  it('reads the whole history with takeAll', async () => {
    const release = createSimpleGitRelease(repoDir, { remote: 'origin' });
    const log = await release.getLog({
      hosting: noHosting,
      prevTag: tagName('v1.0.0'),
      currTag: null,
      takeAll: true,
    });

    assert.ok(log.ok);
    assert.equal(log.val.level, CommitLevel.FEATURE);
    assert.deepEqual(
      log.val.changelog.feat.map((e) => e.summary),
      ['initial layout'],
    );
  });

  it('commits and tags release files', async () => {
    const release = createSimpleGitRelease(repoDir, { remote: 'origin' });
    await fs.writeFile(path.join(repoDir, 'CHANGELOG.md'), '# Changelog\n', 'utf-8');

    assert.ok((await release.addFiles(['CHANGELOG.md'])).ok);
    assert.ok((await release.commit('chore: release 1.0.1')).ok);
    assert.ok((await release.annotatedTag(tagName('v1.0.1'), 'release 1.0.1')).ok);

    const head = await git.log({ maxCount: 1 });
    assert.equal(head.latest?.message, 'chore: release 1.0.1');
    const tags = await release.tagList();
    assert.ok(tags.ok);
    assert.deepEqual(tags.val, ['v1.0.0', 'v1.0.1']);
  });

  it('skips adding when there are no files', async () => {
    const release = createSimpleGitRelease(repoDir, { remote: 'origin' });
    assert.ok((await release.addFiles([])).ok);
  });

  it('reports a push to a missing remote as a git error', async () => {
    const release = createSimpleGitRelease(repoDir, { remote: 'origin' });
    const pushed = await release.push(true);
    assert.ok(!pushed.ok);
    assert.equal(pushed.err.type, 'GitCommandFailedError');
  });

  it('reads remote URLs and config values', async () => {
    await git.addRemote('origin', 'git@github.com:acme/widgets.git');

    const url = await getRemoteUrl(repoDir, 'origin');
    assert.ok(url.ok);
    assert.equal(url.val, 'git@github.com:acme/widgets.git');

    const missing = await getRemoteUrl(repoDir, 'upstream');
    assert.ok(missing.ok);
    assert.equal(missing.val, null);

    assert.equal(await readGitConfig(repoDir, 'user.name'), 'Test User');
    assert.equal(await readGitConfig(repoDir, 'buildflow.missing'), '');
  });
});
