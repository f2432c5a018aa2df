#!/usr/bin/env node

/**
 * .flow/config.json 用の JSON スキーマを生成
 */

import { configJsonSchema } from '../src/types/config.ts';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

async function main() {
  const schema = configJsonSchema();

  const distPath = path.join(process.cwd(), 'dist');
  await fs.mkdir(distPath, { recursive: true });

  const outputPath = path.join(distPath, 'config.schema.json');
  await fs.writeFile(outputPath, `${JSON.stringify(schema, null, 2)}\n`, 'utf-8');
  console.log(`✓ Generated ${path.relative(process.cwd(), outputPath)}`);
}

main().catch((error: unknown) => {
  console.error('Failed to generate config schema:', error);
  process.exit(1);
});
