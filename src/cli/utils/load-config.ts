import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import { ConfigSchema, type Config } from '../../types/config.ts';
import { configParseError, configValidationError, type ConfigError } from '../../types/errors.ts';
import { toDisplayPath } from './display-path.ts';

export const CONFIG_DIR = '.flow';
export const CONFIG_FILE = 'config.json';

export const configPath = (root: string): string => path.join(root, CONFIG_DIR, CONFIG_FILE);

/**
 * リポジトリの設定ファイルを読み込む
 *
 * ファイルがなければすべてデフォルト値の設定を返す。
 */
export async function loadConfig(root: string): Promise<Result<Config, ConfigError>> {
  const filePath = configPath(root);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return createOk(ConfigSchema.parse({}));
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    return createErr(configParseError(toDisplayPath(filePath), error));
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return createErr(configValidationError(details, toDisplayPath(filePath)));
  }
  return createOk(parsed.data);
}
