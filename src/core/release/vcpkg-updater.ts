import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type { VersionUpdater } from '../../types/release.ts';

export const VCPKG_MANIFEST = 'vcpkg.json';

const VERSION_KEYS = ['version', 'version-string', 'version-semver'] as const;

/** 値は検証しない（未知のキーもそのまま書き戻す） */
const VcpkgManifestSchema = z.record(z.string(), z.unknown());

/**
 * vcpkg.json のバージョンを追従させる
 *
 * マニフェストがなければ何も変更せず空の一覧を返す。
 */
export function createVcpkgUpdater(root: string): VersionUpdater {
  const filePath = path.join(root, VCPKG_MANIFEST);

  return {
    name: 'vcpkg',
    async onVersionChange(version: string): Promise<readonly string[]> {
      let text: string;
      try {
        text = await fs.readFile(filePath, 'utf-8');
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
          return [];
        }
        throw error;
      }

      const parsed = VcpkgManifestSchema.safeParse(JSON.parse(text));
      if (!parsed.success) {
        return [];
      }
      const manifest = parsed.data;

      const key = VERSION_KEYS.find((candidate) => candidate in manifest) ?? 'version';
      const updated = { ...manifest, [key]: version };
      await fs.writeFile(filePath, `${JSON.stringify(updated, null, 2)}\n`, 'utf-8');
      return [VCPKG_MANIFEST];
    },
  };
}
