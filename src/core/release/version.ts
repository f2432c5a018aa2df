import { createErr, createOk, type Result } from 'option-t/plain_result';
import { invalidVersion, type InvalidVersionError } from '../../types/errors.ts';
import { CommitLevel } from '../../types/release.ts';

const NUMERIC = /^\d+$/;

/**
 * レベルに対応するバージョン要素の位置（0: major, 1: minor, 2: patch）
 */
const componentIndex = (level: CommitLevel): number | null => {
  switch (level) {
    case CommitLevel.BREAKING:
      return 0;
    case CommitLevel.FEATURE:
      return 1;
    case CommitLevel.FIX:
      return 2;
    case CommitLevel.BENIGN:
      return null;
  }
};

/**
 * バージョン文字列をレベルに応じて繰り上げる
 *
 * `-` 以降の安定度サフィックスはそのまま残す。コア部分は3要素に
 * 切り詰め（または0で埋め）、繰り上げた要素より右を0にする。
 * 数字以外の要素（`v1.2.3` の `v1` など）は InvalidVersionError。
 *
 * @example
 * bumpVersion('1.2.3', CommitLevel.FEATURE) // Ok('1.3.0')
 * bumpVersion('1.2.3-rc.1', CommitLevel.BENIGN) // Ok('1.2.3-rc.1')
 */
export function bumpVersion(version: string, level: CommitLevel): Result<string, InvalidVersionError> {
  const dash = version.indexOf('-');
  const core = dash < 0 ? version : version.slice(0, dash);
  const stability = dash < 0 ? '' : version.slice(dash);

  const parts = core.split('.');
  if (!parts.every((part) => NUMERIC.test(part))) {
    return createErr(invalidVersion(version));
  }

  const semver = parts.map((part) => Number.parseInt(part, 10));
  while (semver.length < 3) {
    semver.push(0);
  }
  semver.length = 3;

  const index = componentIndex(level);
  if (index !== null) {
    semver[index] = (semver[index] ?? 0) + 1;
    for (let right = index + 1; right < semver.length; right++) {
      semver[right] = 0;
    }
  }

  return createOk(`${semver.join('.')}${stability}`);
}
