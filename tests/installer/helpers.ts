/**
 * Test helpers for installer tests
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { createMemorySink } from '../../scripts/lib/output.js';
import type { CommandRunner, ExecOptions, ExecResult } from '../../scripts/lib/process.js';
import type { ArchiveDownloader } from '../../scripts/install/download.js';
import { createInstallLogger, type InstallLogger } from '../../scripts/install/logger.js';

export function makeTempDir(prefix = 'pymode-deps-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export type RecordedCommand = {
  file: string;
  args: string[];
  cwd: string | undefined;
  env: NodeJS.ProcessEnv;
};

export type FakeRunner = {
  run: CommandRunner;
  calls: RecordedCommand[];
};

function cwdOf(options: ExecOptions | undefined): string | undefined {
  const cwd = options?.cwd;
  if (cwd === undefined) return undefined;
  return typeof cwd === 'string' ? cwd : cwd.pathname;
}

/**
 * Stand-in for the native tools. `tar xzf <name>.tar.gz` creates the
 * `<name>` directory next to the archive, everything else just succeeds
 * unless `failWhen` matches it.
 */
export function createFakeRunner(
  opts: { failWhen?: (file: string, args: string[]) => boolean; events?: string[] } = {}
): FakeRunner {
  const calls: RecordedCommand[] = [];

  const run: CommandRunner = async (file, args, options) => {
    const cwd = cwdOf(options);
    calls.push({ file, args, cwd, env: { ...options?.env } });
    opts.events?.push(`run:${[file, ...args].join(' ')}`);

    if (opts.failWhen?.(file, args)) {
      const result: ExecResult = { ok: false, exitCode: 2, stdout: '', stderr: 'boom' };
      return result;
    }

    if (file === 'tar' && cwd) {
      const archive = args[args.length - 1] ?? '';
      fs.mkdirSync(path.join(cwd, archive.replace(/\.tar\.gz$/, '')), { recursive: true });
    }
    return { ok: true, exitCode: 0, stdout: '', stderr: '' };
  };

  return { run, calls };
}

export type FakeDownloader = {
  download: ArchiveDownloader;
  urls: string[];
};

export function createFakeDownloader(
  opts: { failOn?: string; events?: string[]; onDownload?: () => void } = {}
): FakeDownloader {
  const urls: string[] = [];

  const download: ArchiveDownloader = async (url, destination) => {
    urls.push(url);
    opts.events?.push(`download:${url}`);
    opts.onDownload?.();
    if (opts.failOn && url.includes(opts.failOn)) {
      throw new Error(`getaddrinfo ENOTFOUND ${new URL(url).hostname}`);
    }
    fs.writeFileSync(destination, 'archive');
    return { url, destination, bytes: 7 };
  };

  return { download, urls };
}

export function createTestOutput(): {
  out: ReturnType<typeof createMemorySink>;
  logger: InstallLogger;
} {
  const out = createMemorySink();
  return { out, logger: createInstallLogger(out, { level: 'debug' }) };
}
