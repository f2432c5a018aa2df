import path from 'node:path';

/**
 * 表示用に base からの相対パスへ変換する（base 自身は `.`）
 */
export const toDisplayPath = (targetPath: string, base: string = process.cwd()): string => {
  const relativePath = path.relative(base, path.resolve(base, targetPath));
  return relativePath === '' ? '.' : relativePath;
};
