import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { parseInstallFlags, prepareInstallDirs, resolveInstallConfig } from '../../scripts/install/cli-runtime.js';
import { cleanupTempDir, makeTempDir } from './helpers.js';

const argv = (...args: string[]) => ['node', 'install.ts', ...args];

describe('parseInstallFlags', () => {
  test('prefix is optional', () => {
    assert.deepEqual(parseInstallFlags(argv()), { prefix: undefined });
  });

  test('accepts --prefix=<path>', () => {
    assert.deepEqual(parseInstallFlags(argv('--prefix=/opt/local/')), { prefix: '/opt/local/' });
  });

  test('accepts --prefix <path>', () => {
    assert.deepEqual(parseInstallFlags(argv('--prefix', '/custom/install/path')), {
      prefix: '/custom/install/path'
    });
  });

  test('a repeated --prefix keeps the last value', () => {
    const flags = parseInstallFlags(argv('--prefix=/a/', '--prefix=/b/'));

    assert.deepEqual(flags, { prefix: '/b/' });
    assert.equal(resolveInstallConfig({ prefix: flags.prefix, homeDir: '/home/test', startDir: '/work' }).includeDir, '/b/include/');
  });
});

describe('resolveInstallConfig', () => {
  test('defaults to ~/.pymode/', () => {
    const config = resolveInstallConfig({ homeDir: '/home/test', startDir: '/work' });

    assert.equal(config.installRoot, '/home/test/.pymode/');
    assert.equal(config.includeDir, '/home/test/.pymode/include/');
    assert.equal(config.libDir, '/home/test/.pymode/lib/');
    assert.equal(config.buildDir, '/work/build');
    assert.equal(config.startDir, '/work');
    assert.equal(config.logFile, '/work/install.log');
    assert.equal(config.manifestFile, '/home/test/.pymode_deps');
  });

  test('uses the prefix verbatim', () => {
    const config = resolveInstallConfig({ prefix: '/x/y/', homeDir: '/home/test', startDir: '/work' });

    assert.equal(config.installRoot, '/x/y/');
    assert.equal(config.includeDir, '/x/y/include/');
    assert.equal(config.libDir, '/x/y/lib/');
    assert.equal(config.manifestFile, '/home/test/.pymode_deps');
  });

  test('does not add a trailing slash to the prefix', () => {
    const config = resolveInstallConfig({ prefix: '/opt/local', homeDir: '/home/test', startDir: '/work' });

    assert.equal(config.installRoot, '/opt/local');
    assert.equal(config.includeDir, '/opt/localinclude/');
    assert.equal(config.libDir, '/opt/locallib/');
  });

  test('takes another log file name', () => {
    const config = resolveInstallConfig({ homeDir: '/home/test', startDir: '/work', logFilename: 'install-arpack.log' });
    assert.equal(config.logFile, '/work/install-arpack.log');
  });

  test('is immutable', () => {
    const config = resolveInstallConfig({ homeDir: '/home/test', startDir: '/work' });
    assert.ok(Object.isFrozen(config));
  });
});

describe('prepareInstallDirs', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir();
  });

  afterEach(() => {
    cleanupTempDir(tempDir);
  });

  test('creates the install root with include/ and lib/', () => {
    const config = resolveInstallConfig({ homeDir: tempDir, startDir: tempDir });

    const created = prepareInstallDirs(config);

    assert.deepEqual(created, [config.installRoot, config.includeDir, config.libDir]);
    assert.deepEqual(fs.readdirSync(path.join(tempDir, '.pymode')).sort(), ['include', 'lib']);
  });

  test('running twice leaves the same tree and does not throw', () => {
    const config = resolveInstallConfig({ prefix: path.join(tempDir, 'prefix') + '/', startDir: tempDir });

    prepareInstallDirs(config);
    fs.writeFileSync(path.join(config.libDir, 'libpetsc.so'), '');
    prepareInstallDirs(config);

    assert.deepEqual(fs.readdirSync(path.join(tempDir, 'prefix')).sort(), ['include', 'lib']);
    assert.deepEqual(fs.readdirSync(config.libDir), ['libpetsc.so']);
  });
});
