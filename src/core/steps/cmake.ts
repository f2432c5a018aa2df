/**
 * CMake のビルドとパッケージ作成
 */

import type { StepConfig } from '../../types/config.ts';
import type { Runtime } from '../../types/runtime.ts';
import type { Step } from '../../types/step.ts';
import { ProcessRunner } from '../runner/process-runner.ts';

async function runTool(
  runner: ProcessRunner,
  rt: Runtime,
  command: string,
  args: string[],
  cwd?: string,
): Promise<number> {
  rt.print(command, ...args);
  if (rt.dryRun) {
    return 0;
  }
  const result = await runner.run(command, args, { cwd, inherit: true });
  return result.exitCode ?? 1;
}

export function createBuildStep(runner: ProcessRunner): Step {
  return {
    name: 'Build',
    runsAfter: [],
    runsBefore: [],
    isActive: () => true,
    run: (config: StepConfig, rt: Runtime) => runTool(runner, rt, 'cmake', ['--build', config.buildDir]),
  };
}

export function createPackStep(runner: ProcessRunner): Step {
  return {
    name: 'Pack',
    runsAfter: ['Build'],
    runsBefore: [],
    isActive: (config) => config.cpackGenerator.length > 0,
    run: (config, rt) => runTool(runner, rt, 'cpack', ['-G', config.cpackGenerator.join(';')], config.buildDir),
  };
}
