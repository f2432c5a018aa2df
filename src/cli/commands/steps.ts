import { Command } from 'commander';
import type { Runtime } from '../../types/runtime.ts';
import { orderSteps } from '../../core/steps/order.ts';
import { ANSI, colorize } from '../progress/ansi-utils.ts';
import { createCliRegistry, loadConfigOrExit, runtimeFromCommand, toStepConfig } from '../utils/cli-context.ts';

/**
 * `buildflow steps` コマンド
 *
 * パイプライン順にステップを並べ、有効なものに印を付ける。
 */
export function createStepsCommand(): Command {
  return new Command('steps')
    .description('List the build pipeline steps in run order')
    .action(async (_options: unknown, command: Command) => {
      const rt: Runtime = runtimeFromCommand(command);
      try {
        const root = process.cwd();
        const config = await loadConfigOrExit(rt, root);
        const stepConfig = toStepConfig(root, config);

        const ordered = orderSteps(createCliRegistry(root, config).steps.get());
        if (!ordered.ok) {
          rt.fatal(ordered.err.message);
        }

        for (const step of ordered.val) {
          const mark = step.isActive(stepConfig, rt) ? colorize('*', ANSI.GREEN, rt.useColor) : ' ';
          rt.message('always', `${mark} ${step.name}`);
        }
      } catch (error) {
        rt.fatal(error instanceof Error ? error.message : String(error));
      }
    });
}
