/**
 * Code Signing
 *
 * 署名の仕組みはプラットフォーム依存のため、起動時の判定で実装を選ぶ。
 * Windows 以外では何もしない NullSigner を使う。
 */

import * as fs from 'node:fs/promises';
import type { TargetOs } from '../../types/config.ts';
import { ProcessRunner } from '../../core/runner/process-runner.ts';

export interface Signer {
  readonly name: string;
  isActive(os: TargetOs, verbose: boolean): boolean;
  /** 署名して終了コードを返す */
  sign(files: readonly string[], verbose: boolean): Promise<number>;
  isPeExecutable(file: string): Promise<boolean>;
}

export const nullSigner: Signer = {
  name: 'null',
  isActive: () => false,
  sign: async () => 0,
  isPeExecutable: async () => false,
};

const PE_OFFSET_FIELD = 0x3c;

/**
 * MZ ヘッダと PE シグネチャを確認する
 */
export async function isPeExecutable(file: string): Promise<boolean> {
  const handle = await fs.open(file, 'r');
  try {
    const dos = Buffer.alloc(PE_OFFSET_FIELD + 4);
    const { bytesRead } = await handle.read(dos, 0, dos.length, 0);
    if (bytesRead < dos.length || dos.toString('latin1', 0, 2) !== 'MZ') {
      return false;
    }

    const peOffset = dos.readUInt32LE(PE_OFFSET_FIELD);
    const signature = Buffer.alloc(4);
    const peRead = await handle.read(signature, 0, 4, peOffset);
    return peRead.bytesRead === 4 && signature.toString('latin1') === 'PE\0\0';
  } finally {
    await handle.close();
  }
}

/**
 * signtool を呼び出す Signer
 */
export function createSigntoolSigner(runner: ProcessRunner = new ProcessRunner()): Signer {
  return {
    name: 'signtool',
    isActive: (os) => os === 'windows',
    async sign(files, verbose) {
      const args = ['sign', '/fd', 'SHA256', '/a', ...(verbose ? ['/v'] : []), ...files];
      const result = await runner.run('signtool', args, { inherit: true });
      return result.exitCode ?? 1;
    },
    isPeExecutable,
  };
}

/**
 * 実行中のプラットフォームで使える Signer を選ぶ
 */
export function probeSigner(platform: NodeJS.Platform = process.platform, runner?: ProcessRunner): Signer {
  return platform === 'win32' ? createSigntoolSigner(runner) : nullSigner;
}
