/**
 * Unit tests for Settings Resolver
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { DEFAULTS, applyDefaults, resolveSettings } from '../../../src/config/resolver.js';
import { SettingsError } from '../../../src/core/errors.js';
import { createTempDir, removeTempDir } from '../../helpers/fakes.js';

describe('applyDefaults', () => {
  it('should fill every missing value', () => {
    const resolved = applyDefaults({}, '/configs');

    assert.deepStrictEqual(resolved, {
      configDir: '/configs',
      settingsPath: join('/configs', 'settings.yaml'),
      gdbPort: DEFAULTS.gdbPort,
      versionCheck: true,
    });
  });

  it('should keep explicit values', () => {
    const resolved = applyDefaults({ gdb_port: 9000, version_check: false }, '/configs');

    assert.strictEqual(resolved.gdbPort, 9000);
    assert.strictEqual(resolved.versionCheck, false);
  });
});

describe('resolveSettings', () => {
  let configDir: string;

  beforeEach(async () => {
    configDir = await createTempDir('qlaunch-settings');
  });

  afterEach(async () => {
    await removeTempDir(configDir);
  });

  it('should use defaults when no settings file exists', async () => {
    const settings = await resolveSettings({ configDir, env: {} });

    assert.strictEqual(settings.configDir, configDir);
    assert.strictEqual(settings.gdbPort, 1234);
    assert.strictEqual(settings.versionCheck, true);
  });

  it('should read settings.yaml from the configuration directory', async () => {
    await writeFile(join(configDir, 'settings.yaml'), 'gdb_port: 2345\n', 'utf-8');

    const settings = await resolveSettings({ configDir, env: {} });

    assert.strictEqual(settings.gdbPort, 2345);
    assert.strictEqual(settings.versionCheck, true);
  });

  it('should locate the directory through QLAUNCH_CONFIG_DIR', async () => {
    await writeFile(join(configDir, 'settings.yaml'), 'version_check: false\n', 'utf-8');

    const settings = await resolveSettings({ env: { QLAUNCH_CONFIG_DIR: configDir } });

    assert.strictEqual(settings.configDir, configDir);
    assert.strictEqual(settings.versionCheck, false);
  });

  it('should throw SettingsError with validation details', async () => {
    await writeFile(join(configDir, 'settings.yaml'), 'gdb_port: 0\n', 'utf-8');
    const settingsPath = join(configDir, 'settings.yaml');

    await assert.rejects(resolveSettings({ configDir, env: {} }), (error: unknown) => {
      assert.ok(error instanceof SettingsError);
      assert.strictEqual(error.message, `Invalid settings file ${settingsPath}`);
      assert.deepStrictEqual(error.validationErrors, [{ path: '/gdb_port', message: 'must be >= 1' }]);
      return true;
    });
  });

  it('should throw SettingsError for unparseable YAML', async () => {
    await writeFile(join(configDir, 'settings.yaml'), 'gdb_port: [1\n', 'utf-8');

    await assert.rejects(resolveSettings({ configDir, env: {} }), SettingsError);
  });
});
