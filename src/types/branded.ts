/**
 * Branded Types for type-safe domain identifiers
 *
 * タグ名をバージョン文字列やブランチ名と取り違えないよう、
 * Branded Type で区別する。
 */

declare const brand: unique symbol;
type Brand<K, T> = T & { readonly [brand]: K };

export type TagName = Brand<'TagName', string>;

export const tagName = (raw: string): TagName => raw as TagName;

/**
 * バージョン文字列からリリースタグ名を作る（`1.2.3` → `v1.2.3`）
 */
export const versionTag = (version: string): TagName => tagName(`v${version}`);
