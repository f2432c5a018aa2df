import { fileURLToPath } from 'node:url';
import * as path from 'node:path';

/**
 * パッケージのルート（templates/ と package.json がある場所）
 */
export const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
