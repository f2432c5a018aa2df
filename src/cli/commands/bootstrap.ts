import { Command } from 'commander';
import * as fs from 'node:fs/promises';
import type { Runtime } from '../../types/runtime.ts';
import { runtimeFromCommand } from '../utils/cli-context.ts';

/**
 * GitHub Actions の後続ステップへ PATH を引き継ぐ
 *
 * @returns GITHUB_ENV に書き込んだ場合 true
 */
export async function exportPathToGitHubEnv(env: NodeJS.ProcessEnv, rt: Runtime): Promise<boolean> {
  const githubEnv = env['GITHUB_ENV'];
  if (githubEnv === undefined) {
    return false;
  }

  rt.message('debug', `PATH >> ${githubEnv}`);
  if (rt.dryRun) {
    return true;
  }
  await fs.appendFile(githubEnv, `PATH=${env['PATH'] ?? ''}\n`, 'utf-8');
  return true;
}

/**
 * `buildflow bootstrap` コマンド
 */
export function createBootstrapCommand(): Command {
  return new Command('bootstrap')
    .description('Finish bootstrapping a CI job')
    .action(async (_options: unknown, command: Command) => {
      const rt: Runtime = runtimeFromCommand(command);
      try {
        await exportPathToGitHubEnv(process.env, rt);
      } catch (error) {
        rt.fatal(error instanceof Error ? error.message : String(error));
      }
    });
}
