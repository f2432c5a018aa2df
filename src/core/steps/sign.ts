/**
 * 署名ステップ
 *
 * - Sign: ビルド後、パッケージ前にバイナリへ署名
 * - SignPackages: WIX で作った .msi へ署名
 * - SignInit: init 後に署名鍵を .gitignore へ追加
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { minimatch } from 'minimatch';
import type { StepConfig, TargetOs } from '../../types/config.ts';
import type { Runtime } from '../../types/runtime.ts';
import type { SettingsContext } from '../../types/settings.ts';
import type { InitStep, Step } from '../../types/step.ts';
import type { Signer } from '../../adapters/signing/signer.ts';
import { toPosixPath } from '../layers/file-info.ts';

export const SIGNATURE_KEY_IGNORE = '/signature.key';

/**
 * 除外パターンに一致するか（Windows では拡張子を除いた名前で照合）
 */
export function shouldExclude(filename: string, exclude: readonly string[], os: TargetOs): boolean {
  const windows = os === 'windows';
  const name = windows ? path.parse(filename).name : filename;
  return exclude.some((pattern) => minimatch(name, pattern, { dot: true, nocase: windows }));
}

abstract class SignBase implements Step {
  abstract readonly name: string;
  abstract readonly runsAfter: readonly string[];
  abstract readonly runsBefore: readonly string[];

  constructor(protected readonly signer: Signer) {}

  isActive(config: StepConfig, rt: Runtime): boolean {
    return this.signer.isActive(config.os, rt.verbose);
  }

  protected abstract getFiles(config: StepConfig): Promise<string[]>;

  async run(config: StepConfig, rt: Runtime): Promise<number> {
    const files = (await this.getFiles(config)).map(toPosixPath);
    if (files.length === 0) {
      return 0;
    }

    rt.print('signtool', ...files.map((file) => path.posix.basename(file)));
    if (rt.dryRun) {
      return 0;
    }
    return this.signer.sign(files, rt.verbose);
  }
}

export class SignFiles extends SignBase {
  readonly name = 'Sign';
  readonly runsAfter = ['Build'];
  readonly runsBefore = ['Pack'];

  protected async getFiles(config: StepConfig): Promise<string[]> {
    const result: string[] = [];
    for (const root of config.binaries.directories) {
      const found = await glob('**/*', {
        cwd: path.join(config.buildDir, root),
        nodir: true,
        dot: true,
        absolute: true,
      });
      for (const file of found.sort()) {
        if (shouldExclude(path.basename(file), config.binaries.exclude, config.os)) {
          continue;
        }
        if (!(await this.signer.isPeExecutable(file))) {
          continue;
        }
        result.push(file);
      }
    }
    return result;
  }
}

export class SignMsi extends SignBase {
  readonly name = 'SignPackages';
  readonly runsAfter = ['Pack'];
  readonly runsBefore = ['StorePackages', 'Store'];

  override isActive(config: StepConfig, rt: Runtime): boolean {
    return super.isActive(config, rt) && config.cpackGenerator.includes('WIX');
  }

  protected async getFiles(config: StepConfig): Promise<string[]> {
    const found = await glob('*.msi', {
      cwd: path.join(config.buildDir, 'packages'),
      nodir: true,
      nocase: true,
      absolute: true,
    });
    return found.sort();
  }
}

/**
 * 署名が有効な環境（または WITH.SIGNING を選んだプロジェクト）で
 * 署名鍵を .gitignore に加える
 */
export class SignInit implements InitStep {
  readonly name = 'SignInit';

  constructor(
    private readonly signer: Signer,
    private readonly os: TargetOs,
  ) {}

  async postprocess(rt: Runtime, context: SettingsContext, targetDir: string): Promise<void> {
    if (!this.signer.isActive(this.os, rt.verbose) && context['WITH.SIGNING'] !== true) {
      return;
    }

    rt.message('debug', `.gitignore += ${SIGNATURE_KEY_IGNORE}`);
    if (rt.dryRun) {
      return;
    }
    await fs.appendFile(path.join(targetDir, '.gitignore'), `\n${SIGNATURE_KEY_IGNORE}\n`, 'utf-8');
  }
}
