/**
 * Unit tests for the execution engine
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';

import {
  buildEffectiveArgs,
  checkVersionDrift,
  debugArgs,
  printStartupMessage,
  reportVersionDrift,
  runConfiguration,
} from '../../../src/core/runner.js';
import {
  ExecutionFailedError,
  IoError,
  NO_EXIT_CODE,
  NotFoundError,
} from '../../../src/core/errors.js';
import { ConfigStore } from '../../../src/store/store.js';
import type { QemuConfig } from '../../../src/store/types.js';
import {
  FakeLauncher,
  RecordingSink,
  createTempDir,
  fakeProbe,
  removeTempDir,
} from '../../helpers/fakes.js';

const BASE: QemuConfig = {
  qemu_bin: 'qemu-system-x86_64',
  args: ['-m', '2G', '-drive', 'file=${DISK}'],
};

describe('debugArgs', () => {
  it('should use the -s shorthand for the default port', () => {
    assert.deepStrictEqual(debugArgs(), ['-s', '-S']);
    assert.deepStrictEqual(debugArgs(1234), ['-s', '-S']);
  });

  it('should spell out the endpoint for other ports', () => {
    assert.deepStrictEqual(debugArgs(4321), ['-gdb', 'tcp::4321', '-S']);
  });
});

describe('buildEffectiveArgs', () => {
  it('should substitute and append debug flags at the end', () => {
    const args = buildEffectiveArgs(BASE, { debug: true, env: { DISK: 'vm.qcow2' } });

    assert.deepStrictEqual(args, ['-m', '2G', '-drive', 'file=vm.qcow2', '-s', '-S']);
  });

  it('should not inject flags without debug', () => {
    const args = buildEffectiveArgs(BASE, { env: {} });

    assert.deepStrictEqual(args, ['-m', '2G', '-drive', 'file=${DISK}']);
  });

  it('should not substitute inside the injected flags', () => {
    const args = buildEffectiveArgs({ qemu_bin: 'q', args: [] }, { debug: true, gdbPort: 9000, env: {} });

    assert.deepStrictEqual(args, ['-gdb', 'tcp::9000', '-S']);
  });
});

describe('checkVersionDrift', () => {
  it('should skip the probe when no version was saved', async () => {
    const probe = fakeProbe('8.2.1');

    const drift = await checkVersionDrift(BASE, probe);

    assert.deepStrictEqual(drift, { status: 'unchecked' });
    assert.deepStrictEqual(probe.calls, []);
  });

  it('should report a match', async () => {
    const drift = await checkVersionDrift({ ...BASE, qemu_version: '8.2.1' }, fakeProbe('8.2.1'));

    assert.deepStrictEqual(drift, { status: 'match', version: '8.2.1' });
  });

  it('should report a mismatch', async () => {
    const drift = await checkVersionDrift({ ...BASE, qemu_version: '7.2.0' }, fakeProbe('8.2.1'));

    assert.deepStrictEqual(drift, { status: 'mismatch', saved: '7.2.0', current: '8.2.1' });
  });

  it('should report undetected when the probe finds nothing', async () => {
    const drift = await checkVersionDrift({ ...BASE, qemu_version: '7.2.0' }, fakeProbe(undefined));

    assert.deepStrictEqual(drift, { status: 'undetected', saved: '7.2.0' });
  });

  it('should treat a throwing probe as undetected', async () => {
    const drift = await checkVersionDrift({ ...BASE, qemu_version: '7.2.0' }, async () => {
      throw new Error('probe exploded');
    });

    assert.deepStrictEqual(drift, { status: 'undetected', saved: '7.2.0' });
  });
});

describe('reportVersionDrift', () => {
  it('should warn with both versions on mismatch', () => {
    const sink = new RecordingSink();

    reportVersionDrift({ status: 'mismatch', saved: '7.2.0', current: '8.2.1' }, sink);

    assert.deepStrictEqual(sink.warnings, [
      'Version mismatch: configuration saved with QEMU 7.2.0, current system has QEMU 8.2.1. Some features might not work as expected.',
    ]);
  });

  it('should warn when detection failed', () => {
    const sink = new RecordingSink();

    reportVersionDrift({ status: 'undetected', saved: '7.2.0' }, sink);

    assert.deepStrictEqual(sink.warnings, ['Could not detect current QEMU version.']);
  });

  it('should stay silent on match', () => {
    const sink = new RecordingSink();

    reportVersionDrift({ status: 'match', version: '8.2.1' }, sink);

    assert.deepStrictEqual(sink.warnings, []);
    assert.deepStrictEqual(sink.lines, []);
  });
});

describe('printStartupMessage', () => {
  it('should print only the header by default', () => {
    const sink = new RecordingSink();

    printStartupMessage('vm', BASE, [], {}, sink);

    assert.deepStrictEqual(sink.lines, ["Starting configuration 'vm'"]);
  });

  it('should include the description, full command and debug hints', () => {
    const sink = new RecordingSink();

    printStartupMessage('vm', { ...BASE, desc: 'Test box' }, ['-m', '2G', '-s', '-S'], { full: true, debug: true }, sink);

    assert.deepStrictEqual(sink.lines, [
      "Starting configuration 'vm' (Test box)",
      '  QEMU: qemu-system-x86_64',
      '  Args: ["-m","2G","-s","-S"]',
      '  Mode: DEBUG',
      '  GDB server: localhost:1234',
      '',
      "Connect with: gdb -ex 'target remote localhost:1234'",
    ]);
  });
});

describe('runConfiguration', () => {
  let tempDir: string;
  let store: ConfigStore;

  beforeEach(async () => {
    tempDir = await createTempDir();
    store = new ConfigStore(tempDir);
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should fail with NotFoundError for an unknown name', async () => {
    const launcher = new FakeLauncher();

    await assert.rejects(
      runConfiguration('missing', {}, { store, launcher, probeVersion: fakeProbe('1.0'), output: new RecordingSink() }),
      (error: unknown) => {
        assert.ok(error instanceof NotFoundError);
        assert.strictEqual(error.message, "Configuration 'missing' does not exist");
        return true;
      }
    );
    assert.strictEqual(launcher.calls.length, 0);
  });

  it('should launch the binary with substituted arguments', async () => {
    await store.save('vm', BASE);
    const launcher = new FakeLauncher();

    const result = await runConfiguration(
      'vm',
      { env: { DISK: 'a.qcow2' } },
      { store, launcher, probeVersion: fakeProbe(undefined), output: new RecordingSink() }
    );

    assert.deepStrictEqual(launcher.calls, [
      { bin: 'qemu-system-x86_64', args: ['-m', '2G', '-drive', 'file=a.qcow2'] },
    ]);
    assert.deepStrictEqual(result.args, ['-m', '2G', '-drive', 'file=a.qcow2']);
    assert.deepStrictEqual(result.drift, { status: 'unchecked' });
  });

  it('should append exactly the two debug tokens after substitution', async () => {
    await store.save('vm', BASE);
    const launcher = new FakeLauncher();

    await runConfiguration(
      'vm',
      { debug: true, env: { DISK: 'a.qcow2' } },
      { store, launcher, probeVersion: fakeProbe(undefined), output: new RecordingSink() }
    );

    assert.deepStrictEqual(launcher.calls[0]?.args, ['-m', '2G', '-drive', 'file=a.qcow2', '-s', '-S']);
  });

  it('should warn about unset parameters and pass them through', async () => {
    await store.save('vm', BASE);
    const launcher = new FakeLauncher();
    const sink = new RecordingSink();

    await runConfiguration('vm', { env: {} }, { store, launcher, probeVersion: fakeProbe(undefined), output: sink });

    assert.deepStrictEqual(sink.warnings, [
      'Environment variable DISK is not set; ${DISK} is passed through unchanged.',
    ]);
    assert.deepStrictEqual(launcher.calls[0]?.args, ['-m', '2G', '-drive', 'file=${DISK}']);
  });

  it('should treat Object.prototype member names as unset parameters', async () => {
    await store.save('vm', { qemu_bin: 'qemu', args: ['-name', '${constructor}', '-uuid', '${toString}'] });
    const launcher = new FakeLauncher();
    const sink = new RecordingSink();

    await runConfiguration('vm', { env: {} }, { store, launcher, probeVersion: fakeProbe(undefined), output: sink });

    assert.deepStrictEqual(launcher.calls[0]?.args, ['-name', '${constructor}', '-uuid', '${toString}']);
    assert.deepStrictEqual(sink.warnings, [
      'Environment variable constructor is not set; ${constructor} is passed through unchanged.',
      'Environment variable toString is not set; ${toString} is passed through unchanged.',
    ]);
  });

  it('should warn on version drift and still launch', async () => {
    await store.save('vm', { ...BASE, args: [], qemu_version: '7.2.0' });
    const launcher = new FakeLauncher();
    const sink = new RecordingSink();

    const result = await runConfiguration('vm', {}, { store, launcher, probeVersion: fakeProbe('8.2.1'), output: sink });

    assert.strictEqual(sink.warnings.length, 1);
    assert.ok(sink.warnings[0]?.startsWith('Version mismatch: configuration saved with QEMU 7.2.0'));
    assert.strictEqual(launcher.calls.length, 1);
    assert.deepStrictEqual(result.drift, { status: 'mismatch', saved: '7.2.0', current: '8.2.1' });
  });

  it('should skip the version check when disabled', async () => {
    await store.save('vm', { ...BASE, args: [], qemu_version: '7.2.0' });
    const probe = fakeProbe('8.2.1');
    const sink = new RecordingSink();

    await runConfiguration('vm', { checkVersion: false }, { store, launcher: new FakeLauncher(), probeVersion: probe, output: sink });

    assert.deepStrictEqual(probe.calls, []);
    assert.deepStrictEqual(sink.warnings, []);
  });

  it('should fail with ExecutionFailedError carrying the exit code', async () => {
    await store.save('vm', { qemu_bin: 'qemu', args: [] });
    const launcher = new FakeLauncher({ kind: 'exited', code: 3 });

    await assert.rejects(
      runConfiguration('vm', {}, { store, launcher, probeVersion: fakeProbe(undefined), output: new RecordingSink() }),
      (error: unknown) => {
        assert.ok(error instanceof ExecutionFailedError);
        assert.strictEqual(error.processExitCode, 3);
        return true;
      }
    );
  });

  it('should use the sentinel code when QEMU is killed by a signal', async () => {
    await store.save('vm', { qemu_bin: 'qemu', args: [] });
    const launcher = new FakeLauncher({ kind: 'signaled', signal: 'SIGKILL' });

    await assert.rejects(
      runConfiguration('vm', {}, { store, launcher, probeVersion: fakeProbe(undefined), output: new RecordingSink() }),
      (error: unknown) => {
        assert.ok(error instanceof ExecutionFailedError);
        assert.strictEqual(error.processExitCode, NO_EXIT_CODE);
        assert.strictEqual(error.signal, 'SIGKILL');
        return true;
      }
    );
  });

  it('should fail with IoError naming the binary when spawning fails', async () => {
    await store.save('vm', { qemu_bin: '/opt/qemu/missing', args: [] });
    const launcher = new FakeLauncher({ kind: 'spawn-failed', error: new Error('spawn /opt/qemu/missing ENOENT') });

    await assert.rejects(
      runConfiguration('vm', {}, { store, launcher, probeVersion: fakeProbe(undefined), output: new RecordingSink() }),
      (error: unknown) => {
        assert.ok(error instanceof IoError);
        assert.strictEqual(error.target, '/opt/qemu/missing');
        assert.strictEqual(
          error.message,
          'Failed to execute QEMU: /opt/qemu/missing: spawn /opt/qemu/missing ENOENT'
        );
        return true;
      }
    );
  });
});
