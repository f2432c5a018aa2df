import { Command, Option } from 'commander';
import { COMMIT_LEVEL_NAMES, commitLevelFromName, type CommitLevelName } from '../../types/release.ts';
import { createGitHubEffects, createGitHubHosting, noHosting, resolveGitHubRepo } from '../../adapters/github/index.ts';
import { createSimpleGitRelease, getRemoteUrl } from '../../adapters/vcs/simple-git-release.ts';
import { MarkdownChangelog } from '../../core/release/changelog.ts';
import { addRelease } from '../../core/release/orchestrator.ts';
import type { Runtime } from '../../types/runtime.ts';
import { createCliRegistry, loadConfigOrExit, runtimeFromCommand } from '../utils/cli-context.ts';

interface ReleaseOptions {
  level?: string;
  all: boolean;
  publish: boolean;
}

const isCommitLevelName = (value: string): value is CommitLevelName =>
  COMMIT_LEVEL_NAMES.some((name) => name === value);

/**
 * `buildflow release` コマンド
 */
export function createReleaseCommand(): Command {
  return new Command('release')
    .description('Bump the version from the commit log, tag it and publish a release')
    .addOption(new Option('--level <level>', 'Force the bump level').choices(COMMIT_LEVEL_NAMES))
    .option('--all', 'Take all commits into the changelog, not only those since the last tag', false)
    .option('--publish', 'Publish the hosted release instead of leaving a draft', false)
    .action(async (options: ReleaseOptions, command: Command) => {
      const rt: Runtime = runtimeFromCommand(command);
      try {
        const root = process.cwd();
        const config = await loadConfigOrExit(rt, root);
        const registry = createCliRegistry(root, config);

        const remoteUrl = await getRemoteUrl(root, config.release.remote);
        if (!remoteUrl.ok) {
          rt.fatal(remoteUrl.err.message);
        }
        const repo = resolveGitHubRepo(config.hosting.github, remoteUrl.val);
        const hosting = repo ? createGitHubHosting(repo, createGitHubEffects(config.hosting.github)) : noHosting;
        rt.message('debug', repo ? `-- hosting: ${repo.owner}/${repo.repo}` : '-- hosting: none');

        const level = options.level;
        const result = await addRelease({
          rt,
          forcedLevel: level !== undefined && isCommitLevelName(level) ? commitLevelFromName(level) : undefined,
          takeAll: options.all,
          draft: !options.publish,
          changelog: new MarkdownChangelog(root, config.changelog.file),
          git: createSimpleGitRelease(root, { remote: config.release.remote }),
          hosting,
          suites: registry.suites.get(),
          updaters: registry.updaters.get(),
        });

        if (!result.ok) {
          rt.fatal(result.err.message);
        }
        const outcome = result.val;
        rt.print(outcome.dryRun ? `-- would release ${outcome.tag}` : `-- released ${outcome.tag}`);
      } catch (error) {
        rt.fatal(error instanceof Error ? error.message : String(error));
      }
    });
}
