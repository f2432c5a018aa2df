/**
 * LayerInfo
 *
 * 1つの有効化条件を共有するファイル群（レイヤー）。
 * 構築時にコンテキストで条件を評価し、残ったファイルだけを保持する。
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import {
  configFileNotFound,
  configParseError,
  configValidationError,
  type ConfigError,
} from '../../types/errors.ts';
import { LayerDescriptorSchema, type LayerDescriptor } from '../../types/layer.ts';
import type { Runtime } from '../../types/runtime.ts';
import type { SettingsContext } from '../../types/settings.ts';
import { dim } from '../../cli/progress/ansi-utils.ts';
import { renderTemplate, wrapSection } from '../template/renderer.ts';
import { FileInfo } from './file-info.ts';

/** 列挙しないディレクトリ */
const EXCLUDED_DIRS = new Set(['__pycache__', 'node_modules', '.cache']);

/** 列挙しない拡張子（コンパイル済みバイトコード） */
const EXCLUDED_EXTS = new Set(['.pyc', '.pyo', '.pyd']);

/**
 * `<layer-dir>.json` を読み込んで検証する
 */
export async function readLayerDescriptor(layerDir: string): Promise<Result<LayerDescriptor, ConfigError>> {
  const descriptorPath = `${layerDir}.json`;

  let content: string;
  try {
    content = await fs.readFile(descriptorPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return createErr(configFileNotFound(descriptorPath));
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    return createErr(configParseError(descriptorPath, error));
  }

  const parsed = LayerDescriptorSchema.safeParse(raw);
  if (!parsed.success) {
    return createErr(configValidationError(parsed.error.message, descriptorPath));
  }
  return createOk(parsed.data);
}

/**
 * レイヤー配下の通常ファイルを再帰的に列挙する（レイヤールートからの相対パス）
 */
export async function listLayerSources(layerDir: string): Promise<string[]> {
  const sources: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!EXCLUDED_DIRS.has(entry.name)) {
          await walk(fullPath);
        }
      } else if (entry.isFile() && !EXCLUDED_EXTS.has(path.extname(entry.name))) {
        sources.push(path.relative(layerDir, fullPath));
      }
    }
  };

  await walk(layerDir);
  return sources;
}

/**
 * 出力先パスの辞書順比較（UTF-16コード単位）
 */
const byDestination = (a: FileInfo, b: FileInfo): number => (a.dst < b.dst ? -1 : a.dst > b.dst ? 1 : 0);

export class LayerInfo {
  private constructor(
    public readonly root: string,
    /** このレイヤーを含むパッケージ名（進捗表示用） */
    public readonly pkg: string,
    public readonly files: readonly FileInfo[],
    public readonly when?: string,
  ) {}

  /**
   * ディスク上のレイヤーディレクトリから LayerInfo を作る
   *
   * ファイルは出力先パス順に並べ、レイヤー条件とファイル条件の両方を満たすものだけを残す。
   */
  static async fromFs(
    layerDir: string,
    pkg: string,
    context: SettingsContext,
  ): Promise<Result<LayerInfo, ConfigError>> {
    const descriptor = await readLayerDescriptor(layerDir);
    if (!descriptor.ok) {
      return descriptor;
    }
    const { when, filelist } = descriptor.val;

    const sources = await listLayerSources(layerDir);
    const files = sources.map((src) => FileInfo.fromJson(src, filelist, context));
    files.sort(byDestination);

    const candidate = new LayerInfo(layerDir, pkg, files, when);
    const allowed = new Set(
      renderTemplate(candidate.template(), context)
        .split('\n')
        .filter((line) => line !== ''),
    );

    return createOk(
      new LayerInfo(
        layerDir,
        pkg,
        files.filter((file) => allowed.has(file.dst)),
        when,
      ),
    );
  }

  get name(): string {
    return path.basename(this.root);
  }

  /**
   * 各ファイルの条件付き行を連結し、レイヤー条件で囲んだテンプレート
   */
  template(): string {
    return wrapSection(this.files.map((file) => file.template()).join(''), this.when);
  }

  /**
   * レイヤー内のファイルを出力先パス順に書き出す
   */
  async run(rt: Runtime, context: SettingsContext, targetDir: string): Promise<void> {
    rt.print(dim(`[${this.pkg}:${this.name}]`, rt.useColor));
    for (const file of this.files) {
      await file.run(this.root, rt, context, targetDir);
    }
    rt.print('');
  }
}
