import type { ExecResult } from '../lib/process.js';

export class InstallError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InstallError';
  }
}

export class DownloadError extends InstallError {
  readonly url: string;
  readonly statusCode: number | null;

  constructor(url: string, reason: string, opts: { statusCode?: number | null; cause?: unknown } = {}) {
    super(`Failed to download ${url}: ${reason}`, { cause: opts.cause });
    this.name = 'DownloadError';
    this.url = url;
    this.statusCode = opts.statusCode ?? null;
  }
}

/**
 * A native tool (tar, configure, make) exited with a non-zero status.
 */
export class CommandFailedError extends InstallError {
  readonly command: string;
  readonly exitCode: number;

  constructor(file: string, args: readonly string[], result: ExecResult) {
    const command = [file, ...args].join(' ');
    super(`Command failed with exit code ${result.exitCode}: ${command}`);
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = result.exitCode;
  }
}

export class SettingsError extends InstallError {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsError';
  }
}
