/**
 * Registry
 *
 * 起動時に1度だけ組み立て、パイプラインを動かす側へ参照で渡す。
 */

import type { ProjectSuite, VersionUpdater } from '../types/release.ts';
import type { InitStep, Step } from '../types/step.ts';
import type { TargetOs } from '../types/config.ts';
import type { Signer } from '../adapters/signing/signer.ts';
import { ProcessRunner } from './runner/process-runner.ts';
import { createBuildStep, createPackStep } from './steps/cmake.ts';
import { SignFiles, SignInit, SignMsi } from './steps/sign.ts';
import { createCMakeSuite } from './release/project-suites.ts';
import { createVcpkgUpdater } from './release/vcpkg-updater.ts';

/**
 * 登録順を保つコレクション
 */
export class Registry<T extends { readonly name: string }> {
  private readonly items: T[] = [];

  register(item: T): this {
    this.items.push(item);
    return this;
  }

  get(): readonly T[] {
    return this.items;
  }

  find(name: string): T | undefined {
    return this.items.find((item) => item.name === name);
  }
}

export interface FlowRegistry {
  readonly steps: Registry<Step>;
  readonly initSteps: Registry<InitStep>;
  readonly updaters: Registry<VersionUpdater>;
  readonly suites: Registry<ProjectSuite>;
}

export const createFlowRegistry = (): FlowRegistry => ({
  steps: new Registry<Step>(),
  initSteps: new Registry<InitStep>(),
  updaters: new Registry<VersionUpdater>(),
  suites: new Registry<ProjectSuite>(),
});

export interface BuiltinDeps {
  /** 対象リポジトリのルート */
  readonly root: string;
  readonly signer: Signer;
  readonly os: TargetOs;
  readonly runner?: ProcessRunner;
}

/**
 * 組み込みのステップ・スイート・アップデータを登録する
 */
export function registerBuiltins(registry: FlowRegistry, deps: BuiltinDeps): FlowRegistry {
  const runner = deps.runner ?? new ProcessRunner();

  registry.steps
    .register(createBuildStep(runner))
    .register(new SignFiles(deps.signer))
    .register(createPackStep(runner))
    .register(new SignMsi(deps.signer));
  registry.initSteps.register(new SignInit(deps.signer, deps.os));
  registry.suites.register(createCMakeSuite(deps.root));
  registry.updaters.register(createVcpkgUpdater(deps.root));

  return registry;
}
