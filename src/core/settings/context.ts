/**
 * Settings Context Builder
 *
 * 設定テーブルを宣言順に解決し、1回の実行で使う SettingsContext を作る。
 *
 * 解決順序:
 * 1. defaults → switches（オーバーライドを適用した値を、対話モードではプロンプトに、
 *    非対話ではそのまま採用）
 * 2. hidden（質問せずデフォルトを採用）
 * 3. defaults → hidden の fix テンプレート適用
 */

import { createErr, createOk, type Result } from 'option-t/plain_result';
import { missingSetting, type MissingSettingError, type SettingsError } from '../../types/errors.ts';
import type { SettingOverrides } from '../../types/config.ts';
import {
  booleanValue,
  choiceValue,
  stringValue,
  type Setting,
  type SettingScalar,
  type SettingValue,
  type SettingsContext,
  type SettingsReader,
  type SettingsTable,
} from '../../types/settings.ts';
import { renderTemplate } from '../template/renderer.ts';

/**
 * プロンプトに渡す質問
 */
export interface SettingQuestion {
  readonly key: string;
  readonly prompt: string;
  readonly value: SettingValue;
}

/**
 * 設定値を利用者から得るオラクル
 */
export interface SettingPrompter {
  ask(question: SettingQuestion, counter: number, size: number): Promise<SettingScalar>;
}

export interface BuildContextParams {
  readonly table: SettingsTable;
  /** プロジェクト種別フィルタ */
  readonly project?: string;
  readonly overrides: SettingOverrides;
  /** 未指定なら非対話（すべてデフォルト） */
  readonly prompter?: SettingPrompter;
}

/**
 * 未解決キー参照を呼び出し元まで運ぶための内部例外
 */
class MissingSettingSignal extends Error {
  constructor(public readonly error: MissingSettingError) {
    super(error.message);
    this.name = 'MissingSettingSignal';
  }
}

/**
 * プロジェクト種別によるフィルタ
 *
 * 種別未指定のときは共通設定のみ、指定時は共通設定＋その種別の設定。
 */
export function projectFilter(project: string | undefined): (setting: Setting) => boolean {
  if (project === undefined) {
    return (setting) => setting.project === undefined;
  }
  return (setting) => setting.project === undefined || setting.project === project;
}

/**
 * 選択肢の先頭へ指定値を移動する（存在しない場合は先頭に追加）
 */
export function moveToFront(wanted: string, options: readonly string[]): string[] {
  return [wanted, ...options.filter((option) => option !== wanted)];
}

/**
 * yes/no/on/off/1/0（と true/false）を真偽値として読む
 */
export function parseBooleanWord(word: string): boolean | undefined {
  switch (word.trim().toLowerCase()) {
    case 'yes':
    case 'on':
    case '1':
    case 'true':
      return true;
    case 'no':
    case 'off':
    case '0':
    case 'false':
      return false;
    default:
      return undefined;
  }
}

/**
 * オーバーライドをデフォルト値に適用する
 *
 * 文字列はそのまま置き換え、真偽値は真偽値または yes/no などの語で置き換える。
 * 選択肢に対する文字列は先頭へ移動する。読めない値は無視する。
 */
export function applyOverride(value: SettingValue, override: SettingScalar | undefined): SettingValue {
  if (override === undefined) {
    return value;
  }

  switch (value.kind) {
    case 'string':
      return stringValue(String(override));
    case 'boolean': {
      const flag = typeof override === 'boolean' ? override : parseBooleanWord(override);
      return flag === undefined ? value : booleanValue(flag);
    }
    case 'choice':
      return typeof override === 'string' ? choiceValue(moveToFront(override, value.options)) : value;
  }
}

/**
 * デフォルト値から実効値を取り出す（選択肢は先頭）
 */
export function defaultScalar(value: SettingValue): SettingScalar {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'boolean':
      return value.value;
    case 'choice':
      return value.options[0] ?? '';
  }
}

function createReader(settings: Record<string, SettingScalar>, requestedBy: string): SettingsReader {
  const read = (key: string): SettingScalar => {
    const value = settings[key];
    if (value === undefined) {
      throw new MissingSettingSignal(missingSetting(key, requestedBy));
    }
    return value;
  };

  return {
    str: (key) => String(read(key)),
    flag: (key) => {
      const value = read(key);
      return typeof value === 'boolean' ? value : value !== '';
    },
    has: (key) => settings[key] !== undefined,
  };
}

function calcValue(setting: Setting, settings: Record<string, SettingScalar>): SettingValue {
  return setting.calc(createReader(settings, setting.key));
}

/**
 * 値が空なら（または forceFix なら）fix テンプレートで埋める
 */
function fixup(settings: Record<string, SettingScalar>, setting: Setting): void {
  const current = settings[setting.key] ?? '';
  if (current !== '' && !setting.forceFix) {
    return;
  }
  settings[setting.key] = setting.fix ? renderTemplate(setting.fix, settings) : '';
}

/**
 * 設定コンテキストを構築する
 */
export async function buildSettingsContext(
  params: BuildContextParams,
): Promise<Result<SettingsContext, SettingsError>> {
  const { table, project, overrides, prompter } = params;
  const wanted = projectFilter(project);

  const defaults = table.defaults.filter(wanted);
  const switches = table.switches.filter(wanted);
  const hidden = table.hidden.filter(wanted);

  const settings: Record<string, SettingScalar> = {};

  try {
    const asked = [...defaults, ...switches];
    let counter = 1;
    for (const setting of asked) {
      const value = applyOverride(calcValue(setting, settings), overrides[setting.key]);
      settings[setting.key] = prompter
        ? await prompter.ask({ key: setting.key, prompt: setting.prompt, value }, counter, asked.length)
        : defaultScalar(value);
      counter += 1;
    }

    for (const setting of hidden) {
      const value = defaultScalar(calcValue(setting, settings));
      if (typeof value === 'boolean' || value !== '') {
        settings[setting.key] = value;
      }
    }
  } catch (error) {
    if (error instanceof MissingSettingSignal) {
      return createErr(error.error);
    }
    throw error;
  }

  for (const setting of [...defaults, ...hidden]) {
    fixup(settings, setting);
  }

  return createOk(Object.freeze({ ...settings }));
}
