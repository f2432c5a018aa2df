/**
 * Template Renderer
 *
 * mustache によるテキスト展開。設定コンテキストはフラットなドット区切りキーで
 * 保持されているため、描画直前にだけ階層オブジェクトへ変換する。
 */

import Mustache from 'mustache';
import type { SettingScalar, SettingsContext } from '../../types/settings.ts';

/**
 * テンプレートマーカー拡張子
 */
export const MUSTACHE_EXT = '.mustache';

/**
 * 描画用の階層化ビュー
 */
export interface TemplateView {
  [key: string]: SettingScalar | TemplateView;
}

/**
 * フラットなコンテキストを階層オブジェクトに展開する
 *
 * `A.B` と `A` が両方ある場合は、後から来たキーで上書きされる。
 */
export function nestContext(context: SettingsContext): TemplateView {
  const root: TemplateView = {};

  for (const [key, value] of Object.entries(context)) {
    const path = key.split('.');
    const last = path.pop();
    if (last === undefined) {
      continue;
    }

    let node = root;
    for (const step of path) {
      const next = node[step];
      if (typeof next === 'object') {
        node = next;
      } else {
        const created: TemplateView = {};
        node[step] = created;
        node = created;
      }
    }
    node[last] = value;
  }

  return root;
}

/**
 * テンプレートを描画する
 *
 * 生成物はソースコードなので HTML エスケープは行わない。
 */
export function renderTemplate(template: string, context: SettingsContext): string {
  return Mustache.render(template, nestContext(context), undefined, {
    escape: (text: string) => text,
  });
}

/**
 * 条件付きセクションで本文を囲む
 *
 * `when` が未指定なら本文をそのまま返す。
 */
export function wrapSection(body: string, when: string | undefined): string {
  if (!when) {
    return body;
  }
  return `{{#${when}}}\n${body}{{/${when}}}\n`;
}
