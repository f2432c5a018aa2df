/**
 * Release Types
 *
 * リリース処理（バージョン算出 → 変更履歴 → コミット → タグ → ホスティング）
 * が協調相手に求める契約。
 */

import type { Result } from 'option-t/plain_result';
import type { TagName } from './branded.ts';
import type { GitError, GitHubError } from './errors.ts';
import type { Runtime } from './runtime.ts';

/**
 * コミット群が示す変更の大きさ
 *
 * BREAKING → major、FEATURE → minor、FIX → patch、BENIGN → 変更なし。
 */
export const CommitLevel = {
  BENIGN: 0,
  FIX: 1,
  FEATURE: 2,
  BREAKING: 3,
} as const;
export type CommitLevel = (typeof CommitLevel)[keyof typeof CommitLevel];

export const COMMIT_LEVEL_NAMES = ['benign', 'fix', 'feature', 'breaking'] as const;
export type CommitLevelName = (typeof COMMIT_LEVEL_NAMES)[number];

export const commitLevelFromName = (name: CommitLevelName): CommitLevel => {
  switch (name) {
    case 'benign':
      return CommitLevel.BENIGN;
    case 'fix':
      return CommitLevel.FIX;
    case 'feature':
      return CommitLevel.FEATURE;
    case 'breaking':
      return CommitLevel.BREAKING;
  }
};

/**
 * 変更履歴の1エントリ
 */
export interface ChangeEntry {
  readonly hash: string;
  readonly scope: string | null;
  readonly summary: string;
  /** BREAKING CHANGE フッターの本文 */
  readonly breakingNote: string | null;
}

export type ChangeKind = 'breaking' | 'feat' | 'fix';

export type Changelog = Readonly<Record<ChangeKind, readonly ChangeEntry[]>>;

export interface LogResult {
  readonly changelog: Changelog;
  readonly level: CommitLevel;
}

/**
 * 1回のリリースの状態
 *
 * currTag はバージョン確定後に1度だけ設定される。
 */
export interface ReleaseSetup {
  readonly hosting: Hosting;
  readonly prevTag: TagName | null;
  currTag: TagName | null;
  /** 前回タグに関係なく全履歴を対象にする */
  readonly takeAll: boolean;
}

/**
 * リリースで使う Git 操作
 */
export interface ReleaseGit {
  /** タグ一覧（最新が末尾） */
  tagList(): Promise<Result<TagName[], GitError>>;
  /** prevTag..HEAD（takeAll なら全履歴）のコミットを分類する */
  getLog(setup: ReleaseSetup): Promise<Result<LogResult, GitError>>;
  addFiles(paths: readonly string[]): Promise<Result<void, GitError>>;
  commit(message: string): Promise<Result<void, GitError>>;
  annotatedTag(name: TagName, message: string): Promise<Result<void, GitError>>;
  /** 現在のブランチ（withTags ならタグも）をリモートへプッシュ */
  push(withTags: boolean): Promise<Result<void, GitError>>;
}

export interface HostedRelease {
  /** ドラフトとして作成した場合の URL */
  readonly draftUrl: string | null;
}

/**
 * リリースを公開するホスティングサービス
 */
export interface Hosting {
  readonly isActive: boolean;
  addRelease(
    changelog: Changelog,
    setup: ReleaseSetup,
    git: ReleaseGit,
    draft: boolean,
  ): Promise<Result<HostedRelease, GitHubError | GitError>>;
  commitLink(hash: string): string | null;
  compareLink(prev: TagName | null, curr: TagName): string | null;
}

/**
 * バージョン変更に追従してファイルを書き換える協調者
 *
 * 変更したファイルのパス（1つまたは複数）を返す。
 */
export interface VersionUpdater {
  readonly name: string;
  onVersionChange(version: string): Promise<string | readonly string[]>;
}

export interface Project {
  readonly name: string;
  readonly version: string;
}

/**
 * ビルドシステムごとのプロジェクト情報の読み書き
 */
export interface ProjectSuite {
  readonly name: string;
  getProject(rt: Runtime): Promise<Project | null>;
  setVersion(rt: Runtime, version: string): Promise<void>;
  /** バージョンを保持するファイル（リポジトリルートからの相対パス） */
  getVersionFilePath(rt: Runtime): string | null;
}

/**
 * 変更履歴ファイルの書き手
 */
export interface ChangelogWriter {
  readonly filename: string;
  updateChangelog(changelog: Changelog, setup: ReleaseSetup, rt: Runtime): Promise<void>;
}
