/**
 * Release Orchestrator
 *
 * 状態遷移:
 * START → TAGS_LISTED → LOG_ANALYZED → VERSION_COMPUTED → VALIDATED
 *   → [ARTIFACTS_WRITTEN] → COMMITTED → TAGGED → [RELEASED] → DONE
 *
 * dry-run では ARTIFACTS_WRITTEN 以降の変更を行わず、コミット対象の
 * ファイル一覧だけを予測する。コミット後の失敗はロールバックしない。
 */

import { createErr, createOk, type Result } from 'option-t/plain_result';
import { versionTag, type TagName } from '../../types/branded.ts';
import {
  noProject,
  tagAlreadyExists,
  versionNotAdvancing,
  type ReleaseError,
} from '../../types/errors.ts';
import type {
  ChangelogWriter,
  CommitLevel,
  Hosting,
  ProjectSuite,
  ReleaseGit,
  ReleaseSetup,
  VersionUpdater,
} from '../../types/release.ts';
import type { Runtime } from '../../types/runtime.ts';
import { formatCommitMessage } from './changelog.ts';
import { findProject } from './project-suites.ts';
import { bumpVersion } from './version.ts';

export interface ReleaseParams {
  readonly rt: Runtime;
  /** ログから算出したレベルの代わりに使うレベル（BENIGN も有効） */
  readonly forcedLevel?: CommitLevel;
  readonly takeAll: boolean;
  readonly draft: boolean;
  readonly changelog: ChangelogWriter;
  readonly git: ReleaseGit;
  readonly hosting: Hosting;
  readonly suites: readonly ProjectSuite[];
  readonly updaters: readonly VersionUpdater[];
}

export interface ReleaseOutcome {
  readonly version: string;
  readonly tag: TagName;
  /** コミットした（dry-run ではする予定の）ファイル */
  readonly files: readonly string[];
  readonly dryRun: boolean;
  readonly draftUrl: string | null;
}

/**
 * ログからバージョンを繰り上げ、コミット・タグ・リリースを作る
 */
export async function addRelease(params: ReleaseParams): Promise<Result<ReleaseOutcome, ReleaseError>> {
  const { rt, git, hosting, changelog: generator } = params;

  const found = await findProject(params.suites, rt);
  if (!found) {
    return createErr(noProject());
  }
  const { suite, project } = found;

  const tagsResult = await git.tagList();
  if (!tagsResult.ok) {
    return createErr(tagsResult.err);
  }
  const tags = tagsResult.val;

  const setup: ReleaseSetup = {
    hosting,
    prevTag: tags.at(-1) ?? null,
    currTag: null,
    takeAll: params.takeAll,
  };

  const logResult = await git.getLog(setup);
  if (!logResult.ok) {
    return createErr(logResult.err);
  }
  const { changelog, level } = logResult.val;

  const bumped = bumpVersion(project.version, params.forcedLevel ?? level);
  if (!bumped.ok) {
    return createErr(bumped.err);
  }
  const nextVersion = bumped.val;
  const tag = versionTag(nextVersion);
  setup.currTag = tag;

  if (nextVersion === project.version) {
    return createErr(versionNotAdvancing(nextVersion));
  }
  if (tags.includes(tag)) {
    return createErr(tagAlreadyExists(tag));
  }

  rt.message('info', `-- ${project.name} ${project.version} → ${nextVersion}`);

  const files: string[] = [generator.filename];
  const versionPath = suite.getVersionFilePath(rt);

  if (rt.dryRun) {
    if (versionPath) {
      files.push(versionPath);
    }
    rt.message('info', `-- would commit: ${files.join(', ')}`);
    return createOk({ version: nextVersion, tag, files, dryRun: true, draftUrl: null });
  }

  await generator.updateChangelog(changelog, setup, rt);
  await suite.setVersion(rt, nextVersion);
  if (versionPath) {
    files.push(versionPath);
  }
  for (const updater of params.updaters) {
    const modified = await updater.onVersionChange(nextVersion);
    if (typeof modified === 'string') {
      files.push(modified);
    } else {
      files.push(...modified);
    }
  }

  const releaseMessage = `release ${nextVersion}`;

  const addResult = await git.addFiles(files);
  if (!addResult.ok) {
    return createErr(addResult.err);
  }
  const commitResult = await git.commit(`chore: ${releaseMessage}${formatCommitMessage(changelog)}`);
  if (!commitResult.ok) {
    return createErr(commitResult.err);
  }
  const tagResult = await git.annotatedTag(tag, releaseMessage);
  if (!tagResult.ok) {
    return createErr(tagResult.err);
  }

  let draftUrl: string | null = null;
  if (hosting.isActive) {
    const hosted = await hosting.addRelease(changelog, setup, git, params.draft);
    if (!hosted.ok) {
      return createErr(hosted.err);
    }
    draftUrl = hosted.val.draftUrl;
    if (draftUrl) {
      rt.message('always', '-- Visit draft at', draftUrl);
    }
  }

  return createOk({ version: nextVersion, tag, files, dryRun: false, draftUrl });
}
