/**
 * GitHub API Error Classification
 *
 * Octokit RequestError を HTTP ステータスコードで分類し、GitHubError に変換する。
 */

import {
  githubAuthFailed,
  githubRateLimited,
  githubNotFound,
  githubValidationError,
  githubUnknownError,
  type GitHubError,
  type GitHubNotFoundError,
} from '../../types/errors.ts';

interface RequestError {
  status: number;
  message: string;
  response?: {
    headers?: {
      'x-ratelimit-reset'?: string;
      'x-ratelimit-remaining'?: string;
    };
    data?: unknown;
  };
}

function isRequestError(error: unknown): error is RequestError {
  return typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number';
}

const parseHeader = (value: string | undefined): number | undefined =>
  value ? parseInt(value, 10) : undefined;

/**
 * 422 応答の `errors[0]` から問題のフィールドとコードを取り出す
 *
 * 既存タグに Release を作ろうとすると `{ field: "tag_name", code: "already_exists" }` が返る。
 */
function firstValidationIssue(data: unknown): { field?: string; code?: string } {
  if (typeof data !== 'object' || data === null || !('errors' in data) || !Array.isArray(data.errors)) {
    return {};
  }
  const first: unknown = data.errors[0];
  if (typeof first !== 'object' || first === null) {
    return {};
  }
  return {
    field: 'field' in first && typeof first.field === 'string' ? first.field : undefined,
    code: 'code' in first && typeof first.code === 'string' ? first.code : undefined,
  };
}

/**
 * OctokitのエラーをGitHubErrorに分類する
 *
 * @param resourceType - 404 のときに見つからなかったとみなすリソース
 */
export function classifyGitHubError(
  error: unknown,
  resourceType: GitHubNotFoundError['resourceType'] = 'repository',
): GitHubError {
  if (!isRequestError(error)) {
    return githubUnknownError(error instanceof Error ? error.message : String(error));
  }

  const statusCode = error.status;
  const message = error.message || `HTTP ${statusCode} error`;

  switch (statusCode) {
    case 401:
    case 403:
      return githubAuthFailed(message);

    case 429: {
      const headers = error.response?.headers;
      return githubRateLimited(
        message,
        parseHeader(headers?.['x-ratelimit-reset']),
        parseHeader(headers?.['x-ratelimit-remaining']),
      );
    }

    case 404:
      return githubNotFound(resourceType, message);

    case 422: {
      const issue = firstValidationIssue(error.response?.data);
      const detail = issue.field && issue.code ? `${message}: ${issue.field} ${issue.code}` : message;
      return githubValidationError(detail, issue.field);
    }

    default:
      return githubUnknownError(message, statusCode, JSON.stringify(error));
  }
}
