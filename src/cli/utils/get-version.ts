import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { PACKAGE_ROOT } from '../../core/paths.ts';

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * package.json のバージョンを取得する
 */
export function getVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(join(PACKAGE_ROOT, 'package.json'), 'utf-8'));
    const parsed = PackageJsonSchema.safeParse(packageJson);
    return parsed.success ? parsed.data.version : '0.0.0-dev';
  } catch {
    // package.jsonの読み取りに失敗した場合のフォールバック
    return '0.0.0-dev';
  }
}
