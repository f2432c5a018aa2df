/**
 * Domain Error Types
 *
 * ドメインエラーの型定義。option-tのResult型と組み合わせて使用する。
 * タグ付きユニオン型により、エラーの種類を型安全に区別できる。
 */

import type { TagName } from './branded.ts';

// ===== Git/VCS Errors =====

export type GitError = GitCommandFailedError;

export interface GitCommandFailedError {
  readonly type: 'GitCommandFailedError';
  readonly command: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly message: string;
}

// GitError コンストラクタ
export const gitCommandFailed = (
  command: string,
  stderr: string,
  exitCode: number,
): GitCommandFailedError => ({
  type: 'GitCommandFailedError',
  command,
  stderr,
  exitCode,
  message: `Git command failed: ${command} (exit code ${exitCode})\n${stderr}`,
});

// ===== GitHub API Errors =====

export type GitHubError =
  | GitHubAuthFailedError
  | GitHubRateLimitedError
  | GitHubNotFoundError
  | GitHubValidationError
  | GitHubUnknownError;

export interface GitHubAuthFailedError {
  readonly type: 'GitHubAuthFailedError';
  readonly missingEnvName?: string;
  readonly message: string;
}

export interface GitHubRateLimitedError {
  readonly type: 'GitHubRateLimitedError';
  readonly resetAt?: number;
  readonly remaining?: number;
  readonly message: string;
}

export interface GitHubNotFoundError {
  readonly type: 'GitHubNotFoundError';
  readonly resourceType: 'repository' | 'release' | 'tag';
  readonly message: string;
}

export interface GitHubValidationError {
  readonly type: 'GitHubValidationError';
  readonly field?: string;
  readonly message: string;
}

export interface GitHubUnknownError {
  readonly type: 'GitHubUnknownError';
  readonly statusCode?: number;
  readonly originalError?: string;
  readonly message: string;
}

// GitHubError コンストラクタ
export const githubAuthFailed = (message: string, missingEnvName?: string): GitHubAuthFailedError => ({
  type: 'GitHubAuthFailedError',
  missingEnvName,
  message,
});

export const githubRateLimited = (
  message: string,
  resetAt?: number,
  remaining?: number,
): GitHubRateLimitedError => ({
  type: 'GitHubRateLimitedError',
  resetAt,
  remaining,
  message,
});

export const githubNotFound = (
  resourceType: 'repository' | 'release' | 'tag',
  message: string,
): GitHubNotFoundError => ({
  type: 'GitHubNotFoundError',
  resourceType,
  message,
});

export const githubValidationError = (message: string, field?: string): GitHubValidationError => ({
  type: 'GitHubValidationError',
  field,
  message,
});

export const githubUnknownError = (
  message: string,
  statusCode?: number,
  originalError?: string,
): GitHubUnknownError => ({
  type: 'GitHubUnknownError',
  statusCode,
  originalError,
  message,
});

// ===== Config Errors =====

export type ConfigError = ConfigFileNotFoundError | ConfigParseError | ConfigValidationError;

export interface ConfigFileNotFoundError {
  readonly type: 'ConfigFileNotFoundError';
  readonly filePath: string;
  readonly message: string;
}

export interface ConfigParseError {
  readonly type: 'ConfigParseError';
  readonly filePath: string;
  readonly cause?: unknown;
  readonly message: string;
}

export interface ConfigValidationError {
  readonly type: 'ConfigValidationError';
  readonly filePath?: string;
  readonly details: string;
  readonly message: string;
}

// ConfigError コンストラクタ
export const configFileNotFound = (filePath: string): ConfigFileNotFoundError => ({
  type: 'ConfigFileNotFoundError',
  filePath,
  message: `Configuration file not found: ${filePath}`,
});

export const configParseError = (filePath: string, cause?: unknown): ConfigParseError => ({
  type: 'ConfigParseError',
  filePath,
  cause,
  message: `Failed to parse configuration file: ${filePath}${cause instanceof Error ? `\n${cause.message}` : ''}`,
});

export const configValidationError = (details: string, filePath?: string): ConfigValidationError => ({
  type: 'ConfigValidationError',
  filePath,
  details,
  message: `Configuration validation failed${filePath ? ` (${filePath})` : ''}: ${details}`,
});

// ===== Settings Errors =====

export type SettingsError = MissingSettingError;

/**
 * 設定のデフォルト計算が、まだ解決されていないキーを参照した
 */
export interface MissingSettingError {
  readonly type: 'MissingSettingError';
  readonly key: string;
  readonly requestedBy: string;
  readonly message: string;
}

export const missingSetting = (key: string, requestedBy: string): MissingSettingError => ({
  type: 'MissingSettingError',
  key,
  requestedBy,
  message: `Setting "${requestedBy}" depends on "${key}", which is not resolved yet`,
});

// ===== Release Errors =====

export type ReleaseError =
  | NoProjectError
  | InvalidVersionError
  | VersionNotAdvancingError
  | TagAlreadyExistsError
  | GitError
  | GitHubError;

export interface NoProjectError {
  readonly type: 'NoProjectError';
  readonly message: string;
}

export interface InvalidVersionError {
  readonly type: 'InvalidVersionError';
  readonly version: string;
  readonly message: string;
}

export interface VersionNotAdvancingError {
  readonly type: 'VersionNotAdvancingError';
  readonly version: string;
  readonly message: string;
}

export interface TagAlreadyExistsError {
  readonly type: 'TagAlreadyExistsError';
  readonly tag: TagName;
  readonly message: string;
}

// ReleaseError コンストラクタ
export const noProject = (): NoProjectError => ({
  type: 'NoProjectError',
  message: 'No matching project suite found for this repository',
});

export const invalidVersion = (version: string): InvalidVersionError => ({
  type: 'InvalidVersionError',
  version,
  message: `Version ${version} is not a dotted list of numbers`,
});

export const versionNotAdvancing = (version: string): VersionNotAdvancingError => ({
  type: 'VersionNotAdvancingError',
  version,
  message: `Version ${version} is not advancing; nothing to release`,
});

export const tagAlreadyExists = (tag: TagName): TagAlreadyExistsError => ({
  type: 'TagAlreadyExistsError',
  tag,
  message: `Tag ${tag} already exists.`,
});

// ===== Step Errors =====

export type StepError = StepCycleError;

export interface StepCycleError {
  readonly type: 'StepCycleError';
  readonly steps: string[];
  readonly message: string;
}

export const stepCycle = (steps: string[]): StepCycleError => ({
  type: 'StepCycleError',
  steps,
  message: `Step ordering has a cycle between: ${steps.join(', ')}`,
});
