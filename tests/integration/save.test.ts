/**
 * Integration tests for the `save` command
 *
 * Saves through a real store in a temp directory with a stubbed version probe.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { saveConfiguration } from '../../src/cli/commands/save.js';
import { InvalidBinaryError, InvalidNameError, getExitCode } from '../../src/core/errors.js';
import { ConfigStore } from '../../src/store/store.js';
import { createTempDir, fakeProbe, fixedConfirm, removeTempDir } from '../helpers/fakes.js';

describe('save command integration', () => {
  let tempDir: string;
  let store: ConfigStore;

  beforeEach(async () => {
    tempDir = await createTempDir('qlaunch-save');
    store = new ConfigStore(join(tempDir, 'configs'));
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should save a new configuration with the detected QEMU version', async () => {
    const probe = fakeProbe('8.2.1');
    const confirm = fixedConfirm(true);

    const result = await saveConfiguration(
      {
        name: 'ubuntu',
        qemuBin: 'qemu-system-x86_64',
        args: ['-m', '2G', '-hda', '${IMG}'],
        desc: 'Ubuntu VM',
      },
      { store, probeVersion: probe, confirm }
    );

    assert.deepStrictEqual(result, {
      status: 'saved',
      path: join(tempDir, 'configs', 'ubuntu.json'),
      overwritten: false,
      config: {
        qemu_bin: 'qemu-system-x86_64',
        args: ['-m', '2G', '-hda', '${IMG}'],
        desc: 'Ubuntu VM',
        qemu_version: '8.2.1',
      },
    });
    assert.deepStrictEqual(probe.calls, ['qemu-system-x86_64']);
    assert.deepStrictEqual(confirm.asked, []);

    const text = await readFile(join(tempDir, 'configs', 'ubuntu.json'), 'utf-8');
    assert.strictEqual(
      text,
      [
        '{',
        '  "qemu_bin": "qemu-system-x86_64",',
        '  "args": [',
        '    "-m",',
        '    "2G",',
        '    "-hda",',
        '    "${IMG}"',
        '  ],',
        '  "desc": "Ubuntu VM",',
        '  "qemu_version": "8.2.1"',
        '}',
        '',
      ].join('\n')
    );
  });

  it('should omit the version when it cannot be detected', async () => {
    const result = await saveConfiguration(
      { name: 'arm', qemuBin: 'qemu-system-aarch64', args: [] },
      { store, probeVersion: fakeProbe(undefined), confirm: fixedConfirm(true) }
    );

    assert.strictEqual(result.status, 'saved');
    assert.deepStrictEqual(await store.load('arm'), { qemu_bin: 'qemu-system-aarch64', args: [] });
  });

  it('should keep the existing configuration when overwrite is declined', async () => {
    await store.save('vm', { qemu_bin: 'qemu-old', args: ['-m', '1G'] });
    const probe = fakeProbe('9.0.0');
    const confirm = fixedConfirm(false);

    const result = await saveConfiguration(
      { name: 'vm', qemuBin: 'qemu-new', args: [] },
      { store, probeVersion: probe, confirm }
    );

    assert.deepStrictEqual(result, { status: 'cancelled' });
    assert.deepStrictEqual(confirm.asked, ["Configuration 'vm' already exists, overwrite?"]);
    assert.deepStrictEqual(probe.calls, []);
    assert.deepStrictEqual(await store.load('vm'), { qemu_bin: 'qemu-old', args: ['-m', '1G'] });
  });

  it('should overwrite after confirmation', async () => {
    await store.save('vm', { qemu_bin: 'qemu-old', args: [] });

    const result = await saveConfiguration(
      { name: 'vm', qemuBin: 'qemu-new', args: ['-nographic'] },
      { store, probeVersion: fakeProbe('9.0.0'), confirm: fixedConfirm(true) }
    );

    assert.strictEqual(result.status === 'saved' && result.overwritten, true);
    assert.deepStrictEqual(await store.load('vm'), {
      qemu_bin: 'qemu-new',
      args: ['-nographic'],
      qemu_version: '9.0.0',
    });
  });

  it('should overwrite without asking when forced', async () => {
    await store.save('vm', { qemu_bin: 'qemu-old', args: [] });
    const confirm = fixedConfirm(false);

    await saveConfiguration(
      { name: 'vm', qemuBin: 'qemu-new', args: [], force: true },
      { store, probeVersion: fakeProbe(undefined), confirm }
    );

    assert.deepStrictEqual(confirm.asked, []);
    assert.deepStrictEqual(await store.load('vm'), { qemu_bin: 'qemu-new', args: [] });
  });

  it('should store arguments verbatim without substitution', async () => {
    await saveConfiguration(
      { name: 'raw', qemuBin: 'qemu', args: ['-drive', 'file=${HOME}/disk.img', '--', ''] },
      { store, probeVersion: fakeProbe(undefined), confirm: fixedConfirm(true) }
    );

    const config = await store.load('raw');
    assert.deepStrictEqual(config.args, ['-drive', 'file=${HOME}/disk.img', '--', '']);
  });

  it('should reject an option in place of the binary when options follow the name', async () => {
    // What `qlaunch save vm -d "my vm" qemu-system-x86_64 -m 512` hands over
    const probe = fakeProbe('8.2.1');

    await assert.rejects(
      saveConfiguration(
        { name: 'vm', qemuBin: '-d', args: ['my vm', 'qemu-system-x86_64', '-m', '512'] },
        { store, probeVersion: probe, confirm: fixedConfirm(true) }
      ),
      (error: unknown) => {
        assert.ok(error instanceof InvalidBinaryError);
        assert.strictEqual(error.message, "Invalid QEMU binary '-d': a binary cannot start with '-'");
        assert.strictEqual(getExitCode(error), 1);
        return true;
      }
    );
    assert.deepStrictEqual(probe.calls, []);
    assert.strictEqual(await store.exists('vm'), false);
  });

  it('should reject invalid names before probing', async () => {
    const probe = fakeProbe('8.2.1');

    await assert.rejects(
      saveConfiguration(
        { name: '../escape', qemuBin: 'qemu', args: [] },
        { store, probeVersion: probe, confirm: fixedConfirm(true) }
      ),
      InvalidNameError
    );
    assert.deepStrictEqual(probe.calls, []);
  });
});
