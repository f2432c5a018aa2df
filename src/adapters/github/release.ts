/**
 * GitHub Release API Adapter
 */

import type { Octokit } from '@octokit/rest';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import type { GitHubError } from '../../types/errors.ts';
import type { CreateReleaseInput, GitHubRelease } from '../../types/github.ts';
import { classifyGitHubError } from './error.ts';

/**
 * タグに対応する GitHub Release を作成する
 */
export async function createRelease(
  octokit: Octokit,
  input: CreateReleaseInput,
): Promise<Result<GitHubRelease, GitHubError>> {
  try {
    const response = await octokit.rest.repos.createRelease({
      owner: input.repo.owner,
      repo: input.repo.repo,
      tag_name: input.tagName,
      name: input.name,
      body: input.body,
      draft: input.draft,
    });

    const data = response.data;
    return createOk({ id: data.id, url: data.html_url, draft: data.draft });
  } catch (error) {
    return createErr(classifyGitHubError(error, 'tag'));
  }
}
