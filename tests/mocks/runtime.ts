import type { Runtime, RuntimeFlags } from '../../src/types/runtime.ts';
import { createRuntime } from '../../src/cli/utils/runtime.ts';

/**
 * fatal() の代わりに投げられる例外
 */
export class FatalExit extends Error {
  constructor(public readonly code: number) {
    super(`exit ${code}`);
    this.name = 'FatalExit';
  }
}

export interface CapturedRuntime {
  readonly rt: Runtime;
  readonly out: string[];
  readonly err: string[];
}

/**
 * 出力を配列に貯める Runtime
 */
export function createTestRuntime(flags: Partial<RuntimeFlags> = {}): CapturedRuntime {
  const out: string[] = [];
  const err: string[] = [];
  const rt = createRuntime(
    { dryRun: false, silent: false, verbose: false, useColor: false, ...flags },
    {
      out: (line) => out.push(line),
      err: (line) => err.push(line),
      exit: (code) => {
        throw new FatalExit(code);
      },
    },
  );
  return { rt, out, err };
}
