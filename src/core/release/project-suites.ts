/**
 * Project Suites
 *
 * ビルドシステムごとにプロジェクト名とバージョンを読み書きする。
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Project, ProjectSuite } from '../../types/release.ts';
import type { Runtime } from '../../types/runtime.ts';

export const CMAKE_LISTS = 'CMakeLists.txt';

const PROJECT_PATTERN = /(\bproject\s*\(\s*)([^\s()]+)(\s+VERSION\s+)([0-9]+(?:\.[0-9]+)*)/;
const STABILITY_PATTERN = /(\bset\s*\(\s*PROJECT_VERSION_STABILITY\s+")([^"]*)(")/;

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * CMakeLists.txt からプロジェクトを読む
 *
 * `project(<name> VERSION x.y.z ...)` と、任意の
 * `set(PROJECT_VERSION_STABILITY "-rc.1")` を連結したものがバージョン。
 */
export function parseCMakeProject(text: string): Project | null {
  const match = PROJECT_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const stability = STABILITY_PATTERN.exec(text)?.[2] ?? '';
  return { name: match[2] ?? '', version: `${match[4] ?? ''}${stability}` };
}

/**
 * CMakeLists.txt のバージョンを書き換える
 */
export function replaceCMakeVersion(text: string, version: string): string {
  const dash = version.indexOf('-');
  const core = dash < 0 ? version : version.slice(0, dash);
  const stability = dash < 0 ? '' : version.slice(dash);

  return text
    .replace(PROJECT_PATTERN, (_all, open: string, name: string, keyword: string) => `${open}${name}${keyword}${core}`)
    .replace(STABILITY_PATTERN, (_all, open: string, _old: string, close: string) => `${open}${stability}${close}`);
}

export function createCMakeSuite(root: string): ProjectSuite {
  const filePath = path.join(root, CMAKE_LISTS);

  return {
    name: 'cmake',

    async getProject(rt: Runtime): Promise<Project | null> {
      const text = await readOptional(filePath);
      if (text === null) {
        rt.message('debug', `cmake: ${CMAKE_LISTS} not found`);
        return null;
      }
      return parseCMakeProject(text);
    },

    async setVersion(rt: Runtime, version: string): Promise<void> {
      const text = await fs.readFile(filePath, 'utf-8');
      rt.message('debug', `cmake: setting version ${version}`);
      await fs.writeFile(filePath, replaceCMakeVersion(text, version), 'utf-8');
    },

    getVersionFilePath: () => CMAKE_LISTS,
  };
}

export interface FoundProject {
  readonly suite: ProjectSuite;
  readonly project: Project;
}

/**
 * 登録順に問い合わせ、最初にプロジェクトを返したスイートを採用する
 */
export async function findProject(suites: readonly ProjectSuite[], rt: Runtime): Promise<FoundProject | null> {
  for (const suite of suites) {
    const project = await suite.getProject(rt);
    if (project) {
      return { suite, project };
    }
  }
  return null;
}
