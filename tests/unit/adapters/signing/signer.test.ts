import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  createSigntoolSigner,
  isPeExecutable,
  nullSigner,
  probeSigner,
} from '../../../../src/adapters/signing/signer.ts';
import { FakeRunner } from '../../../mocks/steps.ts';

function peImage(signature: string): Buffer {
  const image = Buffer.alloc(0x44);
  image.write('MZ', 0, 'latin1');
  image.writeUInt32LE(0x40, 0x3c);
  image.write(signature, 0x40, 'latin1');
  return image;
}

describe('isPeExecutable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pe-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const fileWith = async (name: string, content: Buffer | string) => {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, content);
    return filePath;
  };

  it('accepts an MZ header pointing at a PE signature', async () => {
    assert.equal(await isPeExecutable(await fileWith('app.exe', peImage('PE\0\0'))), true);
  });

  it('rejects a wrong PE signature', async () => {
    assert.equal(await isPeExecutable(await fileWith('app.exe', peImage('NE\0\0'))), false);
  });

  it('rejects short and non-MZ files', async () => {
    assert.equal(await isPeExecutable(await fileWith('short.exe', 'MZ')), false);
    assert.equal(await isPeExecutable(await fileWith('script.sh', `#!/bin/sh\n${' '.repeat(80)}`)), false);
  });
});

describe('signtool signer', () => {
  it('is active only for Windows targets', () => {
    const signer = createSigntoolSigner(new FakeRunner());
    assert.equal(signer.isActive('windows', false), true);
    assert.equal(signer.isActive('linux', false), false);
  });

  it('signs with SHA256 and passes /v when verbose', async () => {
    const runner = new FakeRunner(0);
    const signer = createSigntoolSigner(runner);

    assert.equal(await signer.sign(['C:/build/bin/app.exe'], true), 0);
    assert.deepEqual(runner.calls, [
      {
        command: 'signtool',
        args: ['sign', '/fd', 'SHA256', '/a', '/v', 'C:/build/bin/app.exe'],
        options: { inherit: true },
      },
    ]);
  });

  it('reports a failure exit code', async () => {
    const signer = createSigntoolSigner(new FakeRunner(1));
    assert.equal(await signer.sign(['a.exe'], false), 1);
  });
});

describe('probeSigner', () => {
  it('uses signtool on win32 only', () => {
    assert.equal(probeSigner('win32', new FakeRunner()).name, 'signtool');
    assert.equal(probeSigner('linux'), nullSigner);
    assert.equal(probeSigner('darwin'), nullSigner);
  });
});
