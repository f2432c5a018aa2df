/**
 * Runtime
 *
 * 1回のコマンド実行を通して共有されるフラグと出力チャネル。
 */

/**
 * メッセージの表示レベル
 *
 * - always: silent でも表示
 * - info: silent のとき非表示
 * - debug: verbose のときのみ表示
 */
export type MessageLevel = 'always' | 'info' | 'debug';

export interface RuntimeFlags {
  /** 破壊的な操作（書き込み・コミット・タグ・API呼び出し）を抑止 */
  readonly dryRun: boolean;
  /** 進捗出力を抑止 */
  readonly silent: boolean;
  readonly verbose: boolean;
  /** ANSI装飾を使うか */
  readonly useColor: boolean;
}

export interface Runtime extends RuntimeFlags {
  /** 進捗行（silent のとき非表示） */
  print(...parts: string[]): void;
  /** レベル付きメッセージ */
  message(level: MessageLevel, ...parts: string[]): void;
  /** 1行の診断を出して終了コード1で終了する */
  fatal(message: string): never;
}
