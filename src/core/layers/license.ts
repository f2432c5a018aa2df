import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Runtime } from '../../types/runtime.ts';
import type { SettingsContext } from '../../types/settings.ts';
import { MUSTACHE_EXT } from '../template/renderer.ts';
import { FileInfo } from './file-info.ts';
import { TEMPLATE_DIR } from './gather.ts';

export const LICENSE_KEY = 'COPY.LICENSE';

export const licensesDir = (packageRoot: string): string =>
  path.resolve(packageRoot, TEMPLATE_DIR, 'licenses');

/**
 * 利用可能なライセンスIDを列挙する（`<ID>.mustache` のファイル名順）
 */
export async function listLicenses(packageRoot: string): Promise<string[]> {
  const entries = await fs.readdir(licensesDir(packageRoot), { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(MUSTACHE_EXT))
    .map((entry) => entry.name.slice(0, -MUSTACHE_EXT.length))
    .sort();
}

/**
 * COPY.LICENSE が既知のライセンスを指していれば LICENSE を生成する
 *
 * 1ファイルだけのレイヤーとして FileInfo.run と同じ規約で書き出す。
 *
 * @returns 生成した（dry-run では生成予定の）場合 true
 */
export async function copyLicense(
  packageRoot: string,
  rt: Runtime,
  context: SettingsContext,
  targetDir: string,
): Promise<boolean> {
  const license = context[LICENSE_KEY];
  if (typeof license !== 'string' || license === '') {
    return false;
  }

  const known = await listLicenses(packageRoot);
  if (!known.includes(license)) {
    rt.message('always', `warning: unknown license "${license}"; LICENSE not written`);
    return false;
  }

  const info = new FileInfo(`${license}${MUSTACHE_EXT}`, 'LICENSE', true);
  await info.run(licensesDir(packageRoot), rt, context, targetDir);
  return true;
}
