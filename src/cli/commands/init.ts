import { Command } from 'commander';
import * as path from 'node:path';
import type { SettingOverrides } from '../../types/config.ts';
import { readGitConfig } from '../../adapters/vcs/simple-git-release.ts';
import { initProject } from '../../core/init.ts';
import { listLicenses } from '../../core/layers/license.ts';
import { PACKAGE_ROOT } from '../../core/paths.ts';
import { createDefaultSettings } from '../../core/settings/defaults.ts';
import type { Runtime } from '../../types/runtime.ts';
import { createCliRegistry, loadConfigOrExit, runtimeFromCommand } from '../utils/cli-context.ts';
import { toDisplayPath } from '../utils/display-path.ts';
import { createReadlinePrompter } from '../utils/prompt.ts';

interface InitOptions {
  yes: boolean;
  project?: string;
  define: string[];
}

const DEFAULT_PROJECT = 'cxx';

/**
 * `-D KEY=value` の並びをオーバーライドに変換する
 */
export function parseDefines(defines: readonly string[]): SettingOverrides {
  const overrides: Record<string, string> = {};
  for (const define of defines) {
    const eq = define.indexOf('=');
    if (eq <= 0) {
      throw new Error(`Invalid definition "${define}"; expected KEY=value`);
    }
    overrides[define.slice(0, eq).trim()] = define.slice(eq + 1);
  }
  return overrides;
}

const collect = (value: string, previous: string[]): string[] => [...previous, value];

/**
 * `buildflow init` コマンド
 *
 * 設定を質問し（-y なら既定値で）、テンプレートからプロジェクトを生成する。
 */
export function createInitCommand(): Command {
  return new Command('init')
    .description('Create a new project from the bundled templates')
    .argument('[dir]', 'Target directory', '.')
    .option('-y, --yes', 'Accept all defaults without asking', false)
    .option('-p, --project <id>', 'Project type filter for the settings')
    .option('-D, --define <key=value>', 'Override a setting default (repeatable)', collect, [])
    .action(async (dir: string, options: InitOptions, command: Command) => {
      const rt: Runtime = runtimeFromCommand(command);
      try {
        const root = process.cwd();
        const targetDir = path.resolve(dir);
        const config = await loadConfigOrExit(rt, root);
        const registry = createCliRegistry(targetDir, config);

        const table = createDefaultSettings({
          dirName: path.basename(targetDir),
          userName: await readGitConfig(root, 'user.name'),
          userEmail: await readGitConfig(root, 'user.email'),
          year: new Date().getFullYear(),
          licenses: await listLicenses(PACKAGE_ROOT),
        });

        const prompter = options.yes ? undefined : createReadlinePrompter();
        const result = await initProject({
          rt,
          packageRoot: PACKAGE_ROOT,
          targetDir,
          table,
          project: options.project ?? config.project ?? DEFAULT_PROJECT,
          overrides: { ...config.defaults, ...parseDefines(options.define) },
          prompter,
          initSteps: registry.initSteps.get(),
        }).finally(() => prompter?.close());

        if (!result.ok) {
          rt.fatal(result.err.message);
        }
        rt.message('info', `-- ${result.val.files.length} files in ${toDisplayPath(targetDir)}`);
      } catch (error) {
        rt.fatal(error instanceof Error ? error.message : String(error));
      }
    });
}
