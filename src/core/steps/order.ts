import { createErr, createOk, type Result } from 'option-t/plain_result';
import { stepCycle, type StepError } from '../../types/errors.ts';
import type { Step } from '../../types/step.ts';

/**
 * runsAfter / runsBefore を満たす順に並べる
 *
 * 制約のないステップ同士は登録順を保つ。
 */
export function orderSteps<T extends Pick<Step, 'name' | 'runsAfter' | 'runsBefore'>>(
  steps: readonly T[],
): Result<T[], StepError> {
  const index = new Map(steps.map((step, position) => [step.name, position]));
  const successors = steps.map((): Set<number> => new Set());
  const inDegree = steps.map(() => 0);

  const addEdge = (from: number | undefined, to: number | undefined): void => {
    if (from === undefined || to === undefined || from === to) {
      return;
    }
    const edges = successors[from];
    if (edges && !edges.has(to)) {
      edges.add(to);
      inDegree[to] = (inDegree[to] ?? 0) + 1;
    }
  };

  steps.forEach((step, position) => {
    for (const name of step.runsAfter) {
      addEdge(index.get(name), position);
    }
    for (const name of step.runsBefore) {
      addEdge(position, index.get(name));
    }
  });

  const ordered: T[] = [];
  const done = new Set<number>();
  while (ordered.length < steps.length) {
    const next = steps.findIndex((_, position) => !done.has(position) && inDegree[position] === 0);
    const step = steps[next];
    if (next < 0 || !step) {
      const remaining = steps.filter((_, position) => !done.has(position)).map((s) => s.name);
      return createErr(stepCycle(remaining));
    }

    done.add(next);
    ordered.push(step);
    for (const successor of successors[next] ?? []) {
      inDegree[successor] = (inDegree[successor] ?? 0) - 1;
    }
  }

  return createOk(ordered);
}
