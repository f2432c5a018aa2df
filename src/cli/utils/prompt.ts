import readline from 'readline/promises';
import type { SettingQuestion, SettingPrompter } from '../../core/settings/context.ts';
import { defaultScalar, parseBooleanWord } from '../../core/settings/context.ts';
import type { SettingScalar, SettingValue } from '../../types/settings.ts';

const describeDefault = (value: SettingValue): string => {
  const scalar = defaultScalar(value);
  return typeof scalar === 'boolean' ? (scalar ? 'yes' : 'no') : scalar;
};

/**
 * `[n/size] prompt [default]: ` 形式の質問文
 *
 * 選択肢は候補を括弧で並べる。
 */
export function formatQuestion(question: SettingQuestion, counter: number, size: number): string {
  const { value } = question;
  const options = value.kind === 'choice' && value.options.length > 1 ? ` (${value.options.join(', ')})` : '';
  return `[${counter}/${size}] ${question.prompt}${options} [${describeDefault(value)}]: `;
}

/**
 * 入力を設定値として解釈する
 *
 * 空入力はデフォルト。解釈できない入力は undefined。
 */
export function parseAnswer(value: SettingValue, answer: string): SettingScalar | undefined {
  const trimmed = answer.trim();
  if (trimmed === '') {
    return defaultScalar(value);
  }

  switch (value.kind) {
    case 'string':
      return trimmed;
    case 'boolean':
      return parseBooleanWord(trimmed);
    case 'choice':
      return value.options.includes(trimmed) ? trimmed : undefined;
  }
}

const invalidHint = (value: SettingValue): string => {
  switch (value.kind) {
    case 'string':
      return 'Invalid input.';
    case 'boolean':
      return 'Invalid input. Please enter yes/no, on/off or 1/0.';
    case 'choice':
      return `Invalid input. Please choose one of: ${value.options.join(', ')}`;
  }
};

/**
 * 端末で1行ずつ質問する SettingPrompter
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): SettingPrompter & { close(): void } {
  const rl = readline.createInterface({ input, output });

  return {
    async ask(question, counter, size) {
      while (true) {
        const answer = await rl.question(formatQuestion(question, counter, size));
        const parsed = parseAnswer(question.value, answer);
        if (parsed !== undefined) {
          return parsed;
        }
        output.write(`${invalidHint(question.value)}\n`);
      }
    },
    close: () => rl.close(),
  };
}
