import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { exportPathToGitHubEnv } from '../../../../src/cli/commands/bootstrap.ts';
import { createTestRuntime } from '../../../mocks/runtime.ts';

describe('exportPathToGitHubEnv', () => {
  let dir: string;
  let envFile: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bootstrap-'));
    envFile = path.join(dir, 'github_env');
    await fs.writeFile(envFile, 'CC=clang\n', 'utf-8');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('appends PATH to the GITHUB_ENV file', async () => {
    const { rt } = createTestRuntime();

    const written = await exportPathToGitHubEnv({ GITHUB_ENV: envFile, PATH: '/opt/cmake/bin:/usr/bin' }, rt);

    assert.equal(written, true);
    assert.equal(await fs.readFile(envFile, 'utf-8'), 'CC=clang\nPATH=/opt/cmake/bin:/usr/bin\n');
  });

  it('does nothing outside GitHub Actions', async () => {
    const { rt } = createTestRuntime();
    assert.equal(await exportPathToGitHubEnv({ PATH: '/usr/bin' }, rt), false);
  });

  it('leaves the file alone in dry-run', async () => {
    const { rt, out } = createTestRuntime({ dryRun: true, verbose: true });

    assert.equal(await exportPathToGitHubEnv({ GITHUB_ENV: envFile, PATH: '/usr/bin' }, rt), true);
    assert.deepEqual(out, [`PATH >> ${envFile}`]);
    assert.equal(await fs.readFile(envFile, 'utf-8'), 'CC=clang\n');
  });
});
