/**
 * リリース処理の協調者のフェイク
 */

import { createOk } from 'option-t/plain_result';
import { tagName, type TagName } from '../../src/types/branded.ts';
import {
  CommitLevel,
  type ChangeEntry,
  type Changelog,
  type ChangelogWriter,
  type Hosting,
  type LogResult,
  type Project,
  type ProjectSuite,
  type ReleaseGit,
  type ReleaseSetup,
  type VersionUpdater,
} from '../../src/types/release.ts';

export const entry = (hash: string, summary: string, scope: string | null = null): ChangeEntry => ({
  hash,
  scope,
  summary,
  breakingNote: null,
});

export const changelogOf = (partial: Partial<Record<keyof Changelog, ChangeEntry[]>> = {}): Changelog => ({
  breaking: partial.breaking ?? [],
  feat: partial.feat ?? [],
  fix: partial.fix ?? [],
});

export interface FakeGit extends ReleaseGit {
  readonly calls: {
    readonly setups: ReleaseSetup[];
    readonly added: string[][];
    readonly commits: string[];
    readonly tags: Array<{ name: TagName; message: string }>;
    readonly pushes: boolean[];
  };
}

export function createFakeGit(options: { tags?: string[]; log?: LogResult } = {}): FakeGit {
  const log: LogResult = options.log ?? { changelog: changelogOf(), level: CommitLevel.BENIGN };
  const calls: FakeGit['calls'] = { setups: [], added: [], commits: [], tags: [], pushes: [] };

  return {
    calls,
    tagList: async () => createOk((options.tags ?? []).map(tagName)),
    getLog: async (setup) => {
      calls.setups.push({ ...setup });
      return createOk(log);
    },
    addFiles: async (paths) => {
      calls.added.push([...paths]);
      return createOk(undefined);
    },
    commit: async (message) => {
      calls.commits.push(message);
      return createOk(undefined);
    },
    annotatedTag: async (name, message) => {
      calls.tags.push({ name, message });
      return createOk(undefined);
    },
    push: async (withTags) => {
      calls.pushes.push(withTags);
      return createOk(undefined);
    },
  };
}

export interface FakeHosting extends Hosting {
  readonly releases: Array<{ tag: TagName | null; draft: boolean }>;
}

export function createFakeHosting(options: { isActive?: boolean; draftUrl?: string | null } = {}): FakeHosting {
  const releases: FakeHosting['releases'] = [];
  return {
    releases,
    isActive: options.isActive ?? true,
    addRelease: async (_changelog, setup, _git, draft) => {
      releases.push({ tag: setup.currTag, draft });
      return createOk({ draftUrl: options.draftUrl ?? null });
    },
    commitLink: (hash) => `https://example.test/commit/${hash}`,
    compareLink: (prev, curr) =>
      prev ? `https://example.test/compare/${prev}...${curr}` : `https://example.test/commits/${curr}`,
  };
}

export interface FakeSuite extends ProjectSuite {
  readonly versions: string[];
}

export function createFakeSuite(project: Project | null, versionFile: string | null = 'CMakeLists.txt'): FakeSuite {
  const versions: string[] = [];
  return {
    versions,
    name: 'fake',
    getProject: async () => project,
    setVersion: async (_rt, version) => {
      versions.push(version);
    },
    getVersionFilePath: () => versionFile,
  };
}

export interface FakeUpdater extends VersionUpdater {
  readonly versions: string[];
}

export function createFakeUpdater(modified: string | readonly string[]): FakeUpdater {
  const versions: string[] = [];
  return {
    versions,
    name: 'fake-updater',
    onVersionChange: async (version) => {
      versions.push(version);
      return modified;
    },
  };
}

export interface FakeChangelog extends ChangelogWriter {
  readonly updates: ReleaseSetup[];
}

export function createFakeChangelog(filename = 'CHANGELOG.md'): FakeChangelog {
  const updates: ReleaseSetup[] = [];
  return {
    updates,
    filename,
    updateChangelog: async (_changelog, setup) => {
      updates.push({ ...setup });
    },
  };
}
