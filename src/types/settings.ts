/**
 * Settings Model
 *
 * プロジェクト初期化時に解決される設定の型定義。
 * キーはドット区切りのフラットな文字列（例: `COPY.LICENSE`）で保持し、
 * 階層化はテンプレート描画の境界でのみ行う。
 */

/**
 * 解決済みの設定値
 */
export type SettingScalar = string | boolean;

/**
 * 1回の実行で解決された設定コンテキスト
 *
 * 構築後は読み取り専用。
 */
export type SettingsContext = Readonly<Record<string, SettingScalar>>;

/**
 * デフォルト値の種類
 *
 * - string: 自由入力の文字列
 * - boolean: yes/no
 * - choice: 選択肢（先頭が実効デフォルト）
 */
export type SettingValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'choice'; readonly options: readonly string[] };

export const stringValue = (value: string): SettingValue => ({ kind: 'string', value });
export const booleanValue = (value: boolean): SettingValue => ({ kind: 'boolean', value });
export const choiceValue = (options: readonly string[]): SettingValue => ({ kind: 'choice', options });

/**
 * デフォルト計算から、先に解決された設定を読むためのアクセサ
 *
 * 未解決のキーを読むと MissingSettingError になる。
 */
export interface SettingsReader {
  str(key: string): string;
  flag(key: string): boolean;
  has(key: string): boolean;
}

/**
 * 設定の定義
 */
export interface Setting {
  /** ドット区切りのキー */
  readonly key: string;
  /** プロンプト文（空の場合はキーを表示） */
  readonly prompt: string;
  /** 対象プロジェクト種別（未指定なら全プロジェクト共通） */
  readonly project?: string;
  /** 先に解決された設定からデフォルト値を計算する純粋関数 */
  readonly calc: (previous: SettingsReader) => SettingValue;
  /** 解決後に値が空のとき適用する mustache テンプレート */
  readonly fix?: string;
  /** true の場合、値が空でなくても fix を適用する */
  readonly forceFix?: boolean;
}

/**
 * 設定プール
 *
 * - defaults: 質問する設定
 * - switches: 質問する on/off 設定
 * - hidden: 質問せず、常に fix を適用する設定
 */
export interface SettingsTable {
  readonly defaults: readonly Setting[];
  readonly switches: readonly Setting[];
  readonly hidden: readonly Setting[];
}
