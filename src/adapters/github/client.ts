import { Octokit } from '@octokit/rest';
import type { GitHubConfig } from '../../types/config.ts';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import { githubAuthFailed, type GitHubError } from '../../types/errors.ts';

const USER_AGENT = 'buildflow';

/**
 * トークンを環境変数から読んで Octokit を作る
 *
 * トークンがなければ、どの変数を設定すべきかを載せた GitHubAuthFailedError。
 */
export function createGitHubClient(
  config: GitHubConfig,
  env: NodeJS.ProcessEnv = process.env,
): Result<Octokit, GitHubError> {
  const token = env[config.tokenEnvName];
  if (!token) {
    return createErr(
      githubAuthFailed(`Environment variable ${config.tokenEnvName} is not set`, config.tokenEnvName),
    );
  }

  const octokit = new Octokit({
    auth: token,
    baseUrl: config.apiBaseUrl,
    userAgent: USER_AGENT,
  });

  return createOk(octokit);
}
