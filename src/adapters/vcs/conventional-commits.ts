/**
 * Conventional Commits の分類
 *
 * `type(scope)!: summary` 形式のヘッダと `BREAKING CHANGE:` フッターから
 * 変更履歴のエントリとコミットレベルを決める。
 */

import { CommitLevel, type ChangeEntry, type ChangeKind, type LogResult } from '../../types/release.ts';

export interface RawCommit {
  readonly hash: string;
  /** 1行目 */
  readonly message: string;
  readonly body: string;
}

export interface ClassifiedCommit {
  readonly kind: ChangeKind | null;
  readonly level: CommitLevel;
  readonly entry: ChangeEntry;
}

const HEADER_PATTERN = /^(?<type>[a-zA-Z]+)(?:\((?<scope>[^()]*)\))?(?<bang>!)?:\s+(?<summary>.+)$/;
const BREAKING_FOOTER = /^BREAKING[ -]CHANGE:\s*(?<note>[\s\S]*)$/m;

/**
 * 1コミットを分類する（ヘッダが規約に沿わなければ null）
 */
export function classifyCommit(commit: RawCommit): ClassifiedCommit | null {
  const header = HEADER_PATTERN.exec(commit.message.trim());
  if (!header?.groups) {
    return null;
  }

  const type = (header.groups['type'] ?? '').toLowerCase();
  const scope = header.groups['scope']?.trim() || null;
  const summary = (header.groups['summary'] ?? '').trim();
  const footer = BREAKING_FOOTER.exec(commit.body);
  const breakingNote = footer?.groups?.['note']?.trim() || null;
  const breaking = header.groups['bang'] !== undefined || footer !== null;

  const entry: ChangeEntry = { hash: commit.hash, scope, summary, breakingNote };

  if (breaking) {
    return { kind: 'breaking', level: CommitLevel.BREAKING, entry };
  }
  switch (type) {
    case 'feat':
      return { kind: 'feat', level: CommitLevel.FEATURE, entry };
    case 'fix':
      return { kind: 'fix', level: CommitLevel.FIX, entry };
    default:
      return { kind: null, level: CommitLevel.BENIGN, entry };
  }
}

/**
 * コミット列から変更履歴と最大レベルを求める（git log の順序を保つ）
 */
export function classifyCommits(commits: readonly RawCommit[]): LogResult {
  const changelog: Record<ChangeKind, ChangeEntry[]> = { breaking: [], feat: [], fix: [] };
  let level: CommitLevel = CommitLevel.BENIGN;

  for (const commit of commits) {
    const classified = classifyCommit(commit);
    if (!classified) {
      continue;
    }
    if (classified.kind) {
      changelog[classified.kind].push(classified.entry);
    }
    if (classified.level > level) {
      level = classified.level;
    }
  }

  return { changelog, level };
}
