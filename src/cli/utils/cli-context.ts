import * as path from 'node:path';
import type { Command } from 'commander';
import { detectTargetOs, type Config, type StepConfig } from '../../types/config.ts';
import type { Runtime } from '../../types/runtime.ts';
import { probeSigner } from '../../adapters/signing/signer.ts';
import { createFlowRegistry, registerBuiltins, type FlowRegistry } from '../../core/registry.ts';
import { isAnsiEnabled } from '../progress/ansi-utils.ts';
import { loadConfig } from './load-config.ts';
import { consoleOutput, createRuntime, type RuntimeOutput } from './runtime.ts';

/**
 * プログラム全体のオプション
 */
export interface GlobalOptions {
  dryRun?: boolean;
  silent?: boolean;
  verbose?: boolean;
  /** --no-color で false */
  color?: boolean;
}

export function runtimeFromCommand(command: Command, output: RuntimeOutput = consoleOutput): Runtime {
  const options = command.optsWithGlobals<GlobalOptions>();
  return createRuntime(
    {
      dryRun: options.dryRun ?? false,
      silent: options.silent ?? false,
      verbose: options.verbose ?? false,
      useColor: (options.color ?? true) && isAnsiEnabled(process.stdout),
    },
    output,
  );
}

/**
 * 設定を読み込む（失敗は fatal）
 */
export async function loadConfigOrExit(rt: Runtime, root: string): Promise<Config> {
  const result = await loadConfig(root);
  if (!result.ok) {
    return rt.fatal(result.err.message);
  }
  return result.val;
}

export const targetOs = (config: Config) => config.build.os ?? detectTargetOs();

export function toStepConfig(root: string, config: Config): StepConfig {
  return {
    os: targetOs(config),
    buildDir: path.resolve(root, config.build.dir),
    cpackGenerator: config.build.cpackGenerator,
    binaries: config.binaries,
  };
}

export function createCliRegistry(root: string, config: Config): FlowRegistry {
  return registerBuiltins(createFlowRegistry(), {
    root,
    signer: probeSigner(),
    os: targetOs(config),
  });
}
