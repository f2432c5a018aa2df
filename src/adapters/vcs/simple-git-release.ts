/**
 * simple-git を使った ReleaseGit 実装
 */

import { simpleGit, type SimpleGit } from 'simple-git';
import { tryCatchIntoResultAsync } from 'option-t/plain_result/try_catch_async';
import { mapErrForResult } from 'option-t/plain_result/map_err';
import { createOk, type Result } from 'option-t/plain_result';
import { tagName } from '../../types/branded.ts';
import { gitCommandFailed, type GitError } from '../../types/errors.ts';
import type { ReleaseGit } from '../../types/release.ts';
import { classifyCommits } from './conventional-commits.ts';

const toGitError =
  (operation: string) =>
  (err: unknown): GitError => {
    const stderr = err instanceof Error ? err.message : String(err);
    return gitCommandFailed(operation, stderr, -1);
  };

export interface SimpleGitReleaseOptions {
  readonly remote: string;
}

export const createSimpleGitRelease = (root: string, options: SimpleGitReleaseOptions): ReleaseGit => {
  const git: SimpleGit = simpleGit(root);

  const tagList: ReleaseGit['tagList'] = async () => {
    const result = await tryCatchIntoResultAsync(async () => {
      const tags = await git.tags();
      return tags.all.map(tagName);
    });
    return mapErrForResult(result, toGitError('tagList'));
  };

  const getLog: ReleaseGit['getLog'] = async (setup) => {
    const result = await tryCatchIntoResultAsync(async () => {
      const range = !setup.takeAll && setup.prevTag ? [`${setup.prevTag}..HEAD`] : [];
      const log = await git.log(range);
      return classifyCommits(log.all.map(({ hash, message, body }) => ({ hash, message, body })));
    });
    return mapErrForResult(result, toGitError('getLog'));
  };

  const addFiles: ReleaseGit['addFiles'] = async (paths) => {
    if (paths.length === 0) {
      return createOk(undefined);
    }
    const result = await tryCatchIntoResultAsync(async () => {
      await git.add([...paths]);
    });
    return mapErrForResult(result, toGitError('addFiles'));
  };

  const commit: ReleaseGit['commit'] = async (message) => {
    const result = await tryCatchIntoResultAsync(async () => {
      await git.commit(message);
    });
    return mapErrForResult(result, toGitError('commit'));
  };

  const annotatedTag: ReleaseGit['annotatedTag'] = async (name, message) => {
    const result = await tryCatchIntoResultAsync(async () => {
      await git.addAnnotatedTag(name, message);
    });
    return mapErrForResult(result, toGitError('annotatedTag'));
  };

  const push: ReleaseGit['push'] = async (withTags) => {
    const result = await tryCatchIntoResultAsync(async () => {
      await git.push(options.remote, 'HEAD', withTags ? ['--follow-tags'] : []);
    });
    return mapErrForResult(result, toGitError('push'));
  };

  return { tagList, getLog, addFiles, commit, annotatedTag, push };
};

/**
 * リモートの URL を取得する（見つからなければ null）
 */
export async function getRemoteUrl(root: string, remote: string): Promise<Result<string | null, GitError>> {
  const result = await tryCatchIntoResultAsync(async () => {
    const remotes = await simpleGit(root).getRemotes(true);
    const found = remotes.find((candidate) => candidate.name === remote);
    return found ? found.refs.push || found.refs.fetch || null : null;
  });
  return mapErrForResult(result, toGitError('getRemoteUrl'));
}

/**
 * git config の値を読む（未設定なら空文字列）
 */
export async function readGitConfig(root: string, key: string): Promise<string> {
  const result = await tryCatchIntoResultAsync(async () => {
    const entry = await simpleGit(root).getConfig(key);
    return entry.value ?? '';
  });
  return result.ok ? result.val : '';
}
