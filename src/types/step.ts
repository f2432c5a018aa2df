import type { StepConfig } from './config.ts';
import type { Runtime } from './runtime.ts';
import type { SettingsContext } from './settings.ts';

/**
 * ビルドパイプラインの1ステップ
 *
 * runsAfter / runsBefore に登録されていない名前があっても無視する。
 */
export interface Step {
  readonly name: string;
  readonly runsAfter: readonly string[];
  readonly runsBefore: readonly string[];
  isActive(config: StepConfig, rt: Runtime): boolean;
  /** 終了コードを返す（0 以外でパイプラインは停止） */
  run(config: StepConfig, rt: Runtime): Promise<number>;
}

/**
 * init の後処理
 */
export interface InitStep {
  readonly name: string;
  postprocess(rt: Runtime, context: SettingsContext, targetDir: string): Promise<void>;
}
