import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  createCMakeSuite,
  findProject,
  parseCMakeProject,
  replaceCMakeVersion,
} from '../../../../src/core/release/project-suites.ts';
import { createVcpkgUpdater } from '../../../../src/core/release/vcpkg-updater.ts';
import { createTestRuntime } from '../../../mocks/runtime.ts';
import { createFakeSuite } from '../../../mocks/release.ts';

const CMAKE_LISTS = [
  'cmake_minimum_required(VERSION 3.25)',
  'project(demo',
  '  VERSION 1.4.2',
  '  DESCRIPTION "Demo project"',
  '  LANGUAGES CXX)',
  '',
  'set(PROJECT_VERSION_STABILITY "-rc.1")',
  '',
].join('\n');

describe('parseCMakeProject', () => {
  it('reads the name, version and stability suffix', () => {
    assert.deepEqual(parseCMakeProject(CMAKE_LISTS), { name: 'demo', version: '1.4.2-rc.1' });
  });

  it('returns null without a versioned project() call', () => {
    assert.equal(parseCMakeProject('project(demo LANGUAGES CXX)\n'), null);
  });
});

describe('replaceCMakeVersion', () => {
  it('rewrites the version and clears the stability suffix', () => {
    const updated = replaceCMakeVersion(CMAKE_LISTS, '1.5.0');
    assert.deepEqual(parseCMakeProject(updated), { name: 'demo', version: '1.5.0' });
    assert.ok(updated.includes('  VERSION 1.5.0\n'));
    assert.ok(updated.includes('set(PROJECT_VERSION_STABILITY "")'));
  });

  it('writes a new stability suffix', () => {
    const updated = replaceCMakeVersion(CMAKE_LISTS, '2.0.0-beta');
    assert.ok(updated.includes('set(PROJECT_VERSION_STABILITY "-beta")'));
    assert.deepEqual(parseCMakeProject(updated), { name: 'demo', version: '2.0.0-beta' });
  });
});

describe('CMake suite and vcpkg updater', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'suite-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reports no project without CMakeLists.txt', async () => {
    const { rt } = createTestRuntime();
    assert.equal(await createCMakeSuite(tmpDir).getProject(rt), null);
  });

  it('sets the version in CMakeLists.txt', async () => {
    const { rt } = createTestRuntime();
    await fs.writeFile(path.join(tmpDir, 'CMakeLists.txt'), CMAKE_LISTS, 'utf-8');
    const suite = createCMakeSuite(tmpDir);

    await suite.setVersion(rt, '1.5.0');

    assert.deepEqual(await suite.getProject(rt), { name: 'demo', version: '1.5.0' });
    assert.equal(suite.getVersionFilePath(rt), 'CMakeLists.txt');
  });

  it('finds the first suite with a project', async () => {
    const { rt } = createTestRuntime();
    const cmake = createCMakeSuite(tmpDir);
    const fallback = createFakeSuite({ name: 'fallback', version: '0.1.0' });

    const found = await findProject([cmake, fallback], rt);

    assert.equal(found?.suite, fallback);
    assert.deepEqual(found?.project, { name: 'fallback', version: '0.1.0' });
  });

  it('updates the version key already used by vcpkg.json', async () => {
    await fs.writeFile(
      path.join(tmpDir, 'vcpkg.json'),
      JSON.stringify({ name: 'demo', 'version-string': '1.0.0' }),
      'utf-8',
    );

    const modified = await createVcpkgUpdater(tmpDir).onVersionChange('1.1.0');

    assert.deepEqual(modified, ['vcpkg.json']);
    assert.equal(
      await fs.readFile(path.join(tmpDir, 'vcpkg.json'), 'utf-8'),
      '{\n  "name": "demo",\n  "version-string": "1.1.0"\n}\n',
    );
  });

  it('leaves a manifest that is not an object untouched', async () => {
    await fs.writeFile(path.join(tmpDir, 'vcpkg.json'), '["demo"]\n', 'utf-8');

    assert.deepEqual(await createVcpkgUpdater(tmpDir).onVersionChange('1.1.0'), []);
    assert.equal(await fs.readFile(path.join(tmpDir, 'vcpkg.json'), 'utf-8'), '["demo"]\n');
  });

  it('changes nothing without vcpkg.json', async () => {
    assert.deepEqual(await createVcpkgUpdater(tmpDir).onVersionChange('1.1.0'), []);
  });
});
