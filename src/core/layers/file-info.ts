/**
 * FileInfo
 *
 * レイヤー内の1ファイル分のメタデータ（ソース、出力先、テンプレートか否か、条件）。
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { LayerFileEntry } from '../../types/layer.ts';
import type { Runtime } from '../../types/runtime.ts';
import type { SettingsContext } from '../../types/settings.ts';
import { dim } from '../../cli/progress/ansi-utils.ts';
import { MUSTACHE_EXT, renderTemplate, wrapSection } from '../template/renderer.ts';

/**
 * OS区切りのパスを `/` 区切りに正規化する
 */
export const toPosixPath = (osPath: string): string => osPath.split(path.sep).join('/');

/**
 * `/` 区切りのパスをOS区切りに戻す
 */
export const fromPosixPath = (posixPath: string): string => posixPath.split('/').join(path.sep);

/**
 * ソースのモードとタイムスタンプを出力先へ写す（シンボリックリンクは辿らない）
 */
async function copyMetadata(src: string, dst: string): Promise<void> {
  const stat = await fs.lstat(src);
  await fs.chmod(dst, stat.mode & 0o7777);
  await fs.lutimes(dst, stat.atime, stat.mtime);
}

export class FileInfo {
  constructor(
    /** レイヤールートからの相対パス */
    public readonly src: string,
    /** 出力先（生成先ルートからの相対パス） */
    public readonly dst: string,
    public readonly isMustache: boolean,
    public readonly when?: string,
  ) {}

  /**
   * レイヤー記述の filelist とコンテキストから FileInfo を作る
   *
   * 出力先の決定:
   * 1. エントリに path があればテンプレートとして描画した結果
   * 2. `.mustache` ファイルなら拡張子を除いたパス
   * 3. それ以外はソースパスそのまま
   */
  static fromJson(
    src: string,
    filelist: Readonly<Record<string, LayerFileEntry>>,
    context: SettingsContext,
  ): FileInfo {
    const ext = path.extname(src);
    const isMustache = ext === MUSTACHE_EXT;
    const entry = filelist[toPosixPath(src)] ?? {};

    let dst: string;
    if (entry.path !== undefined) {
      dst = fromPosixPath(renderTemplate(entry.path, context));
    } else if (isMustache) {
      dst = src.slice(0, -ext.length);
    } else {
      dst = src;
    }

    return new FileInfo(src, dst, isMustache, entry.when);
  }

  /**
   * 出力先1行を、条件があれば条件付きセクションで囲んだテンプレート
   */
  template(): string {
    return wrapSection(`${this.dst}\n`, this.when);
  }

  /**
   * ファイルを生成先へ書き出す
   *
   * @param root レイヤールート
   * @param targetDir 生成先ルート
   */
  async run(root: string, rt: Runtime, context: SettingsContext, targetDir: string): Promise<void> {
    rt.print(`${dim('+', rt.useColor)} ${this.dst}`);
    if (rt.dryRun) {
      return;
    }

    const src = path.join(root, this.src);
    const dst = path.resolve(targetDir, this.dst);
    await fs.mkdir(path.dirname(dst), { recursive: true });

    if (this.isMustache) {
      const content = await fs.readFile(src, 'utf-8');
      await fs.writeFile(dst, renderTemplate(content, context), 'utf-8');
    } else {
      await fs.copyFile(src, dst);
    }
    await copyMetadata(src, dst);
  }
}
