import type { Result } from 'option-t/plain_result';
import type { GitHubError } from './errors.ts';

/**
 * リリース先リポジトリ
 */
export type GitHubRepo = {
  readonly owner: string;
  readonly repo: string;
  /** Web UI のベースURL（例: https://github.com） */
  readonly webUrl: string;
};

export type CreateReleaseInput = {
  repo: GitHubRepo;
  tagName: string;
  name: string;
  body: string;
  draft: boolean;
};

export type GitHubRelease = {
  readonly id: number;
  readonly url: string;
  readonly draft: boolean;
};

export interface GitHubEffects {
  createRelease(input: CreateReleaseInput): Promise<Result<GitHubRelease, GitHubError>>;
}
