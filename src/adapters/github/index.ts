import { createErr, createOk, isErr } from 'option-t/plain_result';
import type { GitHubConfig } from '../../types/config.ts';
import type { GitHubEffects, GitHubRepo } from '../../types/github.ts';
import type { Hosting } from '../../types/release.ts';
import { renderChangeGroups } from '../../core/release/changelog.ts';
import { createGitHubClient } from './client.ts';
import { createRelease } from './release.ts';

export function createGitHubEffects(config: GitHubConfig, env: NodeJS.ProcessEnv = process.env): GitHubEffects {
  return {
    async createRelease(input) {
      const clientResult = createGitHubClient(config, env);
      if (isErr(clientResult)) {
        return clientResult;
      }
      return createRelease(clientResult.val, input);
    },
  };
}

/**
 * GitHub をリリース先とする Hosting
 *
 * ブランチとタグをプッシュしてから Release を作成する。
 */
export function createGitHubHosting(repo: GitHubRepo, effects: GitHubEffects): Hosting {
  const base = `${repo.webUrl}/${repo.owner}/${repo.repo}`;

  const hosting: Hosting = {
    isActive: true,

    async addRelease(changelog, setup, git, draft) {
      const tag = setup.currTag;
      if (!tag) {
        return createOk({ draftUrl: null });
      }

      const pushed = await git.push(true);
      if (isErr(pushed)) {
        return createErr(pushed.err);
      }

      const created = await effects.createRelease({
        repo,
        tagName: tag,
        name: tag,
        body: renderChangeGroups(changelog, hosting),
        draft,
      });
      if (isErr(created)) {
        return created;
      }
      return createOk({ draftUrl: created.val.draft ? created.val.url : null });
    },

    commitLink: (hash) => `${base}/commit/${hash}`,
    compareLink: (prev, curr) => (prev ? `${base}/compare/${prev}...${curr}` : `${base}/commits/${curr}`),
  };

  return hosting;
}

/**
 * リリース先がないときの Hosting
 */
export const noHosting: Hosting = {
  isActive: false,
  addRelease: async () => createOk({ draftUrl: null }),
  commitLink: () => null,
  compareLink: () => null,
};

export type { GitHubEffects } from '../../types/github.ts';
export { resolveGitHubRepo, parseRemoteUrl } from './remote.ts';
