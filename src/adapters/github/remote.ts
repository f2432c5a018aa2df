import type { GitHubConfig } from '../../types/config.ts';
import type { GitHubRepo } from '../../types/github.ts';

const SCP_PATTERN = /^[^@/]+@(?<host>[^:/]+):(?<path>.+)$/;

/**
 * リモートURLから owner/repo を読み取る
 *
 * `git@host:owner/repo.git`、`https://host/owner/repo(.git)`、
 * `ssh://git@host/owner/repo.git` を受け付ける。
 */
export function parseRemoteUrl(url: string): GitHubRepo | null {
  const trimmed = url.trim();

  let host: string;
  let repoPath: string;
  const scp = SCP_PATTERN.exec(trimmed);
  if (scp?.groups && !trimmed.includes('://')) {
    host = scp.groups['host'] ?? '';
    repoPath = scp.groups['path'] ?? '';
  } else {
    let parsed: URL;
    try {
      parsed = new URL(trimmed);
    } catch {
      return null;
    }
    host = parsed.hostname;
    repoPath = parsed.pathname;
  }

  const [owner, repo] = repoPath
    .replace(/^\/+|\/+$/g, '')
    .replace(/\.git$/, '')
    .split('/');
  if (!host || !owner || !repo) {
    return null;
  }
  return { owner, repo, webUrl: `https://${host}` };
}

/**
 * 設定の owner/repo を優先し、足りない分をリモートURLから補う
 */
export function resolveGitHubRepo(config: GitHubConfig, remoteUrl: string | null): GitHubRepo | null {
  const fromRemote = remoteUrl ? parseRemoteUrl(remoteUrl) : null;
  const owner = config.owner ?? fromRemote?.owner;
  const repo = config.repo ?? fromRemote?.repo;
  if (!owner || !repo) {
    return null;
  }
  return { owner, repo, webUrl: fromRemote?.webUrl ?? 'https://github.com' };
}
