/**
 * プロジェクト生成
 *
 * 設定コンテキストを解決し、レイヤーとライセンスを書き出してから
 * init ステップの後処理を実行する。
 */

import { createErr, createOk, type Result } from 'option-t/plain_result';
import type { SettingOverrides } from '../types/config.ts';
import type { ConfigError, SettingsError } from '../types/errors.ts';
import type { Runtime } from '../types/runtime.ts';
import type { SettingsContext, SettingsTable } from '../types/settings.ts';
import type { InitStep } from '../types/step.ts';
import { gatherPackageLayers } from './layers/gather.ts';
import { copyLicense } from './layers/license.ts';
import { buildSettingsContext, type SettingPrompter } from './settings/context.ts';

export interface InitProjectParams {
  readonly rt: Runtime;
  /** templates/ を持つパッケージのルート */
  readonly packageRoot: string;
  readonly targetDir: string;
  readonly table: SettingsTable;
  readonly project?: string;
  readonly overrides: SettingOverrides;
  readonly prompter?: SettingPrompter;
  readonly initSteps: readonly InitStep[];
}

export interface InitProjectOutcome {
  readonly context: SettingsContext;
  /** 書き出した（dry-run では書き出す予定の）ファイル */
  readonly files: readonly string[];
}

export async function initProject(
  params: InitProjectParams,
): Promise<Result<InitProjectOutcome, SettingsError | ConfigError>> {
  const { rt, packageRoot, targetDir } = params;

  const contextResult = await buildSettingsContext({
    table: params.table,
    project: params.project,
    overrides: params.overrides,
    prompter: params.prompter,
  });
  if (!contextResult.ok) {
    return createErr(contextResult.err);
  }
  const context = contextResult.val;

  const layersResult = await gatherPackageLayers(packageRoot, context);
  if (!layersResult.ok) {
    return createErr(layersResult.err);
  }

  const files: string[] = [];
  for (const layer of layersResult.val) {
    await layer.run(rt, context, targetDir);
    files.push(...layer.files.map((file) => file.dst));
  }

  if (await copyLicense(packageRoot, rt, context, targetDir)) {
    files.push('LICENSE');
  }

  for (const step of params.initSteps) {
    await step.postprocess(rt, context, targetDir);
  }

  return createOk({ context, files });
}
