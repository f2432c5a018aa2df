/**
 * ANSI Escape Sequence Utilities
 *
 * 進捗行の装飾に使うANSIエスケープシーケンス。
 */

export const ANSI = {
  RESET: '\x1b[0m',
  DIM: '\x1b[2m',
  GREEN: '\x1b[32m',
} as const;

/**
 * ANSIが有効かどうかを判定
 *
 * NO_COLOR が設定されていれば無効、FORCE_COLOR が設定されていれば
 * TTYでなくても有効。
 */
export function isAnsiEnabled(
  stream: { readonly isTTY?: boolean },
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return stream.isTTY === true;
}

/**
 * テキストに色を付ける
 */
export function colorize(text: string, color: string, useAnsi: boolean): string {
  if (!useAnsi) {
    return text;
  }
  return `${color}${text}${ANSI.RESET}`;
}

export function dim(text: string, useAnsi: boolean): string {
  return colorize(text, ANSI.DIM, useAnsi);
}
