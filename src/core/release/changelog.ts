/**
 * Changelog
 *
 * 分類済みコミットから CHANGELOG.md のセクション、リリースノート、
 * リリースコミットのメッセージ本文を作る。
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type {
  ChangeEntry,
  ChangeKind,
  Changelog,
  ChangelogWriter,
  Hosting,
  ReleaseSetup,
} from '../../types/release.ts';
import type { Runtime } from '../../types/runtime.ts';

export const CHANGELOG_TITLE = '# Changelog';

const SECTIONS: ReadonlyArray<{ readonly kind: ChangeKind; readonly title: string }> = [
  { kind: 'breaking', title: 'Breaking Changes' },
  { kind: 'feat', title: 'New Features' },
  { kind: 'fix', title: 'Bug Fixes' },
];

const entryText = (kind: ChangeKind, entry: ChangeEntry): string =>
  kind === 'breaking' && entry.breakingNote ? entry.breakingNote : entry.summary;

/**
 * リリースコミットのメッセージ本文
 *
 * 変更がなければ空文字列。あれば空行に続けてセクションごとの一覧。
 */
export function formatCommitMessage(changelog: Changelog): string {
  const blocks = SECTIONS.filter(({ kind }) => changelog[kind].length > 0).map(({ kind, title }) =>
    [
      `${title}:`,
      ...changelog[kind].map((entry) => `- ${entry.scope ? `${entry.scope}: ` : ''}${entryText(kind, entry)}`),
    ].join('\n'),
  );
  return blocks.length === 0 ? '' : `\n\n${blocks.join('\n\n')}`;
}

const markdownEntry = (kind: ChangeKind, entry: ChangeEntry, hosting: Hosting): string => {
  const scope = entry.scope ? `**${entry.scope}:** ` : '';
  const link = hosting.commitLink(entry.hash);
  const ref = link ? ` ([${entry.hash.slice(0, 7)}](${link}))` : '';
  return `- ${scope}${entryText(kind, entry)}${ref}`;
};

/**
 * `### ` 見出し付きのグループ（リリースノート本文としても使う）
 */
export function renderChangeGroups(changelog: Changelog, hosting: Hosting): string {
  return SECTIONS.filter(({ kind }) => changelog[kind].length > 0)
    .map(({ kind, title }) =>
      [`### ${title}`, '', ...changelog[kind].map((entry) => markdownEntry(kind, entry, hosting)), ''].join('\n'),
    )
    .join('\n');
}

export const formatDate = (date: Date): string => date.toISOString().slice(0, 10);

export const tagVersion = (tag: string): string => (tag.startsWith('v') ? tag.slice(1) : tag);

/**
 * 1リリース分のセクション
 */
export function renderChangelogSection(changelog: Changelog, setup: ReleaseSetup, date: Date): string {
  const tag = setup.currTag ?? '';
  const version = tagVersion(tag);
  const compare = setup.currTag ? setup.hosting.compareLink(setup.prevTag, setup.currTag) : null;
  const heading = compare ? `## [${version}](${compare})` : `## ${version}`;
  const groups = renderChangeGroups(changelog, setup.hosting);
  return groups === '' ? `${heading} (${formatDate(date)})\n` : `${heading} (${formatDate(date)})\n\n${groups}`;
}

/**
 * 既存の変更履歴にセクションを差し込む
 *
 * タイトル行の直後に入れる。タイトルがなければ先頭にタイトルを付ける。
 */
export function insertChangelogSection(existing: string, section: string): string {
  const lines = existing.split('\n');
  const titleIndex = lines.findIndex((line) => line.trim() === CHANGELOG_TITLE);

  const head = titleIndex < 0 ? [] : lines.slice(0, titleIndex);
  const rest = (titleIndex < 0 ? lines : lines.slice(titleIndex + 1)).join('\n').replace(/^\n+/, '');

  const prefix = head.length > 0 ? `${head.join('\n')}\n` : '';
  const body = rest === '' ? section : `${section}\n${rest}`;
  return `${prefix}${CHANGELOG_TITLE}\n\n${body}`;
}

/**
 * CHANGELOG.md の書き手
 */
export class MarkdownChangelog implements ChangelogWriter {
  constructor(
    private readonly root: string,
    readonly filename: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async updateChangelog(changelog: Changelog, setup: ReleaseSetup, rt: Runtime): Promise<void> {
    const filePath = path.join(this.root, this.filename);

    let existing = '';
    try {
      existing = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }

    rt.message('debug', `updating ${this.filename}`);
    const section = renderChangelogSection(changelog, setup, this.now());
    await fs.writeFile(filePath, insertChangelogSection(existing, section), 'utf-8');
  }
}
