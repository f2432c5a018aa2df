import { spawn } from 'node:child_process';

/**
 * プロセス実行結果
 */
export interface ProcessResult {
  /** 終了コード（シグナルで終了した場合は null） */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** inherit のときは空 */
  stdout: string;
  stderr: string;
  /** 実行時間（ミリ秒） */
  duration: number;
  /** タイムアウトで終了したか */
  timedOut: boolean;
}

export interface ProcessRunnerOptions {
  /** 作業ディレクトリ */
  cwd?: string;
  /** process.env に重ねる環境変数 */
  env?: Record<string, string>;
  /** タイムアウト（ミリ秒）。0でタイムアウトなし */
  timeout?: number;
  /** 出力をキャプチャせず端末にそのまま流す */
  inherit?: boolean;
}

/**
 * 外部コマンド（cmake, cpack, signtool）の実行ラッパー
 *
 * ビルドツールの出力はそのまま利用者に見せたいので、ステップからは
 * inherit で呼ぶ。キャプチャはテストと診断用。
 */
export class ProcessRunner {
  async run(command: string, args: string[] = [], options: ProcessRunnerOptions = {}): Promise<ProcessResult> {
    const startTime = Date.now();
    const { cwd, env, timeout = 0, inherit = false } = options;

    const abortController = new AbortController();
    const timer = timeout > 0 ? setTimeout(() => abortController.abort(), timeout) : undefined;

    return new Promise<ProcessResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd,
        env: env ? { ...process.env, ...env } : process.env,
        shell: false,
        stdio: inherit ? 'inherit' : 'pipe',
        signal: abortController.signal,
      });

      const stdout: string[] = [];
      const stderr: string[] = [];
      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk.toString('utf-8')));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk.toString('utf-8')));

      const settle = (exitCode: number | null, signal: NodeJS.Signals | null, timedOut: boolean): void => {
        clearTimeout(timer);
        resolve({
          exitCode,
          signal,
          stdout: stdout.join(''),
          stderr: stderr.join(''),
          duration: Date.now() - startTime,
          timedOut,
        });
      };

      child.on('error', (error: Error) => {
        if (error.name === 'AbortError') {
          settle(null, 'SIGTERM', true);
          return;
        }
        clearTimeout(timer);
        reject(error);
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        settle(code, signal, false);
      });
    });
  }
}
