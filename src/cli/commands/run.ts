import { Command } from 'commander';
import type { Runtime } from '../../types/runtime.ts';
import type { StepConfig } from '../../types/config.ts';
import type { Step } from '../../types/step.ts';
import { orderSteps } from '../../core/steps/order.ts';
import { dim } from '../progress/ansi-utils.ts';
import { createCliRegistry, loadConfigOrExit, runtimeFromCommand, toStepConfig } from '../utils/cli-context.ts';

/**
 * 実行するステップを選ぶ
 *
 * 名前の指定がなければ有効なステップすべて、あれば指定されたものを
 * パイプライン順に返す。未登録の名前は unknown に入る。
 */
export function selectSteps(
  ordered: readonly Step[],
  names: readonly string[],
  config: StepConfig,
  rt: Runtime,
): { steps: Step[]; unknown: string[] } {
  if (names.length === 0) {
    return { steps: ordered.filter((step) => step.isActive(config, rt)), unknown: [] };
  }
  const known = new Set(ordered.map((step) => step.name));
  return {
    steps: ordered.filter((step) => names.includes(step.name)),
    unknown: names.filter((name) => !known.has(name)),
  };
}

/**
 * 最初に失敗したステップの終了コードを返す
 */
export async function runSteps(steps: readonly Step[], config: StepConfig, rt: Runtime): Promise<number> {
  for (const step of steps) {
    rt.print(dim(`-- ${step.name}`, rt.useColor));
    const exitCode = await step.run(config, rt);
    if (exitCode !== 0) {
      rt.message('always', `-- ${step.name} failed with exit code ${exitCode}`);
      return exitCode;
    }
  }
  return 0;
}

/**
 * `buildflow run` コマンド
 */
export function createRunCommand(): Command {
  return new Command('run')
    .description('Run the build pipeline steps')
    .argument('[steps...]', 'Steps to run (defaults to every active step)')
    .action(async (names: string[], _options: unknown, command: Command) => {
      const rt: Runtime = runtimeFromCommand(command);
      try {
        const root = process.cwd();
        const config = await loadConfigOrExit(rt, root);
        const stepConfig = toStepConfig(root, config);

        const ordered = orderSteps(createCliRegistry(root, config).steps.get());
        if (!ordered.ok) {
          rt.fatal(ordered.err.message);
        }

        const { steps, unknown } = selectSteps(ordered.val, names, stepConfig, rt);
        if (unknown.length > 0) {
          rt.fatal(`unknown step: ${unknown.join(', ')}`);
        }

        process.exitCode = await runSteps(steps, stepConfig, rt);
      } catch (error) {
        rt.fatal(error instanceof Error ? error.message : String(error));
      }
    });
}
