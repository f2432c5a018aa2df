import type { MessageLevel, Runtime, RuntimeFlags } from '../../types/runtime.ts';

/**
 * Runtime の出力先
 *
 * テストでは配列に貯め、exit で例外を投げる実装に差し替える。
 */
export interface RuntimeOutput {
  out(line: string): void;
  err(line: string): void;
  exit(code: number): never;
}

export const consoleOutput: RuntimeOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  exit: (code) => process.exit(code),
};

const isVisible = (level: MessageLevel, flags: RuntimeFlags): boolean => {
  switch (level) {
    case 'always':
      return true;
    case 'info':
      return !flags.silent;
    case 'debug':
      return flags.verbose;
  }
};

export function createRuntime(flags: RuntimeFlags, output: RuntimeOutput = consoleOutput): Runtime {
  return {
    ...flags,
    print: (...parts) => {
      if (!flags.silent) {
        output.out(parts.join(' '));
      }
    },
    message: (level, ...parts) => {
      if (isVisible(level, flags)) {
        output.out(parts.join(' '));
      }
    },
    fatal: (message) => {
      output.err(`buildflow: ${message}`);
      return output.exit(1);
    },
  };
}
