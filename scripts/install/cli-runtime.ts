import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';

export const DEFAULT_INSTALL_DIRNAME = '.pymode';
export const MANIFEST_FILENAME = '.pymode_deps';
export const LOG_FILENAME = 'install.log';
export const BUILD_DIRNAME = 'build';

export type InstallCliFlags = {
  prefix?: string;
};

export type InstallConfig = Readonly<{
  homeDir: string;
  installRoot: string;
  includeDir: string;
  libDir: string;
  buildDir: string;
  startDir: string;
  logFile: string;
  manifestFile: string;
}>;

export type InstallCliOptions = {
  scriptName?: string;
  description?: string;
};

export function parseInstallFlags(argv: string[] = process.argv, opts: InstallCliOptions = {}): InstallCliFlags {
  const parsed = yargs(hideBin(argv))
    .scriptName(opts.scriptName ?? 'pymode-deps')
    .usage(`$0 [--prefix=<path>]\n\n${opts.description ?? 'Download, build and install PETSc and SLEPc.'}`)
    // A repeated --prefix keeps the last value instead of collecting an array.
    .parserConfiguration({ 'duplicate-arguments-array': false })
    .option('prefix', {
      type: 'string',
      describe: 'Set the installation directory for dependencies',
      requiresArg: true
    })
    .strict()
    .help()
    .alias('help', 'h')
    .parseSync();

  const prefix = parsed.prefix;
  return { prefix: prefix && prefix.length > 0 ? prefix : undefined };
}

/**
 * Derive every path the installer touches. The prefix is used verbatim and
 * sub-directories are appended by concatenation, so a prefix without a
 * trailing slash yields e.g. `/opt/localinclude/`.
 */
export function resolveInstallConfig(params: {
  prefix?: string;
  homeDir?: string;
  startDir?: string;
  logFilename?: string;
}): InstallConfig {
  const homeDir = params.homeDir ?? os.homedir();
  const startDir = params.startDir ?? process.cwd();
  const installRoot = params.prefix ?? `${homeDir}/${DEFAULT_INSTALL_DIRNAME}/`;

  return Object.freeze({
    homeDir,
    installRoot,
    includeDir: installRoot + 'include/',
    libDir: installRoot + 'lib/',
    buildDir: path.join(startDir, BUILD_DIRNAME),
    startDir,
    logFile: path.join(startDir, params.logFilename ?? LOG_FILENAME),
    manifestFile: path.join(homeDir, MANIFEST_FILENAME)
  });
}

/**
 * Create the install root and its include/ and lib/ children. Safe to re-run.
 */
export function prepareInstallDirs(config: InstallConfig): string[] {
  const dirs = [config.installRoot, config.includeDir, config.libDir];
  for (const dir of dirs) {
    fs.mkdirSync(dir, { recursive: true });
  }
  return dirs;
}
