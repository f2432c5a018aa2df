/**
 * 組み込みの設定テーブル
 */

import { booleanValue, choiceValue, stringValue, type SettingsTable } from '../../types/settings.ts';

/**
 * テーブル構築時に外部から与える値
 *
 * デフォルト計算を純粋関数に保つため、環境依存の値はここで受け取る。
 */
export interface SettingsEnvironment {
  /** 生成先ディレクトリ名（プロジェクト名のデフォルト） */
  readonly dirName: string;
  /** git config user.name */
  readonly userName: string;
  /** git config user.email */
  readonly userEmail: string;
  readonly year: number;
  /** templates/licenses にあるライセンスID（先頭がデフォルト） */
  readonly licenses: readonly string[];
}

export const PROJECT_TYPES = ['console-application', 'static-library', 'shared-library'] as const;

/**
 * プロジェクト名を CMake ターゲット名に変換する
 */
export function toTargetName(name: string): string {
  const target = name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return target === '' ? 'project' : target;
}

export function createDefaultSettings(env: SettingsEnvironment): SettingsTable {
  return {
    defaults: [
      {
        key: 'PROJECT.NAME',
        prompt: 'Project name',
        calc: () => stringValue(env.dirName),
      },
      {
        key: 'PROJECT.DESCRIPTION',
        prompt: 'Project description',
        calc: () => stringValue(''),
        fix: '{{PROJECT.NAME}} project',
      },
      {
        key: 'PROJECT.VERSION',
        prompt: 'Initial version',
        calc: () => stringValue('0.1.0'),
      },
      {
        key: 'PROJECT.TYPE',
        prompt: 'Project type',
        project: 'cxx',
        calc: () => choiceValue(PROJECT_TYPES),
      },
      {
        key: 'PROJECT.CXX_STANDARD',
        prompt: 'C++ standard',
        project: 'cxx',
        calc: () => choiceValue(['20', '17', '23']),
      },
      {
        key: 'PROJECT.EMAIL',
        prompt: 'Maintainer e-mail',
        calc: () => stringValue(env.userEmail),
      },
      {
        key: 'COPY.YEAR',
        prompt: 'Copyright year',
        calc: () => stringValue(String(env.year)),
      },
      {
        key: 'COPY.HOLDER',
        prompt: 'Copyright holder',
        calc: () => stringValue(env.userName),
        fix: '{{PROJECT.NAME}} authors',
      },
      {
        key: 'COPY.LICENSE',
        prompt: 'License',
        calc: () => choiceValue(env.licenses),
      },
    ],
    switches: [
      {
        key: 'WITH.TESTS',
        prompt: 'Add unit tests',
        calc: () => booleanValue(true),
      },
      {
        key: 'WITH.GITHUB_ACTIONS',
        prompt: 'Add GitHub Actions workflow',
        calc: () => booleanValue(true),
      },
      {
        key: 'WITH.SIGNING',
        prompt: 'Sign Windows binaries',
        project: 'cxx',
        calc: () => booleanValue(false),
      },
    ],
    hidden: [
      {
        key: 'PROJECT.TARGET',
        prompt: '',
        calc: (previous) => stringValue(toTargetName(previous.str('PROJECT.NAME'))),
      },
      {
        key: 'PROJECT.PREFIX',
        prompt: '',
        calc: (previous) => stringValue(toTargetName(previous.str('PROJECT.NAME')).toUpperCase()),
      },
      {
        key: 'PROJECT.IS_LIBRARY',
        prompt: '',
        project: 'cxx',
        calc: (previous) => booleanValue(previous.str('PROJECT.TYPE').endsWith('-library')),
      },
      {
        key: 'PROJECT.IS_APPLICATION',
        prompt: '',
        project: 'cxx',
        calc: (previous) => booleanValue(!previous.str('PROJECT.TYPE').endsWith('-library')),
      },
      {
        key: 'COPY.NOTICE',
        prompt: '',
        calc: () => stringValue(''),
        fix: 'Copyright (c) {{COPY.YEAR}} {{COPY.HOLDER}}',
        forceFix: true,
      },
    ],
  };
}
