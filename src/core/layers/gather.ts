/**
 * Layer Gatherer
 *
 * パッケージの layers ディレクトリを走査し、生成対象のレイヤーを集める。
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createOk, type Result } from 'option-t/plain_result';
import type { ConfigError } from '../../types/errors.ts';
import type { SettingsContext } from '../../types/settings.ts';
import { LayerInfo } from './layer-info.ts';

export const TEMPLATE_DIR = 'templates';

/**
 * レイヤーディレクトリを発見順に列挙する
 *
 * 同名の `.json` が隣にあるディレクトリがレイヤー。レイヤーの内側は走査しない。
 */
export async function findLayerDirs(layersDir: string): Promise<string[]> {
  const found: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    const names = new Set(entries.map((entry) => entry.name));
    const dirs = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();

    for (const name of dirs) {
      const fullPath = path.join(dir, name);
      if (names.has(`${name}.json`)) {
        found.push(fullPath);
      } else {
        await walk(fullPath);
      }
    }
  };

  await walk(layersDir);
  return found;
}

/**
 * パッケージ内の、ファイルが1つ以上残るレイヤーを集める
 *
 * @param packageRoot templates ディレクトリを含むパッケージのルート
 */
export async function gatherPackageLayers(
  packageRoot: string,
  context: SettingsContext,
): Promise<Result<LayerInfo[], ConfigError>> {
  const layersDir = path.resolve(packageRoot, TEMPLATE_DIR, 'layers');
  const pkg = path.basename(path.resolve(packageRoot));

  const layers: LayerInfo[] = [];
  for (const layerDir of await findLayerDirs(layersDir)) {
    const layer = await LayerInfo.fromFs(layerDir, pkg, context);
    if (!layer.ok) {
      return layer;
    }
    if (layer.val.files.length > 0) {
      layers.push(layer.val);
    }
  }

  return createOk(layers);
}
