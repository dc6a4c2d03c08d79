import fs from 'node:fs';

import { execCmd, type CommandRunner } from '../lib/process.js';
import type { Writer } from '../lib/output.js';
import { errorMessage, print, symbols } from '../utils.js';
import { prepareInstallDirs, type InstallConfig } from './cli-runtime.js';
import { downloadArchive, type ArchiveDownloader } from './download.js';
import type { InstallLogger } from './logger.js';
import { manifestForInstallRoot, writeManifest } from './manifest.js';
import { installPackage, type PackageInstallResult } from './package-installer.js';
import { DEFAULT_PACKAGES, type AnyPackageSpec } from './packages.js';

export type InstallDeps = {
  run?: CommandRunner;
  download?: ArchiveDownloader;
  packages?: readonly AnyPackageSpec[];
};

export type RunInstallResult =
  | { status: 'completed'; manifestFile: string | null; packages: PackageInstallResult[] }
  | { status: 'failed'; packageName?: string; error: string };

/**
 * Leave the process where it started and drop the build workspace.
 */
export function finishInstall(config: InstallConfig): void {
  if (process.cwd() !== config.startDir) {
    process.chdir(config.startDir);
  }
  fs.rmSync(config.buildDir, { recursive: true, force: true });
}

export async function runInstall(params: {
  config: InstallConfig;
  out: Writer;
  logger: InstallLogger;
  env?: NodeJS.ProcessEnv;
  deps?: InstallDeps;
  /** Record the install root in the pymode manifest once every package is in. */
  writeManifest?: boolean;
}): Promise<RunInstallResult> {
  const { config, out, logger, deps = {}, writeManifest: recordManifest = true } = params;
  const packages = deps.packages ?? DEFAULT_PACKAGES;
  const env: NodeJS.ProcessEnv = { ...(params.env ?? process.env) };

  logger.info({ installRoot: config.installRoot, buildDir: config.buildDir }, 'install.start');

  const installed: PackageInstallResult[] = [];
  let current: AnyPackageSpec | undefined;

  try {
    prepareInstallDirs(config);
    fs.mkdirSync(config.buildDir, { recursive: true });

    for (const spec of packages) {
      current = spec;
      installed.push(
        await installPackage(spec, {
          installRoot: config.installRoot,
          buildDir: config.buildDir,
          env,
          out,
          logger,
          run: deps.run ?? execCmd,
          download: deps.download ?? downloadArchive
        })
      );
    }
    current = undefined;

    if (recordManifest) {
      writeManifest(config.manifestFile, manifestForInstallRoot(config.installRoot));
      logger.info({ manifestFile: config.manifestFile }, 'install.manifest.written');
    }
  } catch (e) {
    const error = errorMessage(e);
    print(out, `${symbols.error} ${error}`, 'red');
    logger.error({ packageName: current?.name, error }, 'install.failed');
    finishInstall(config);

    print(out, 'Failed installing pymode dependencies', 'red');
    print(out, `${symbols.log} See log: ${config.logFile}`, 'red');
    return { status: 'failed', packageName: current?.name, error };
  }

  // Everything is installed at this point; a leftover workspace is only worth a warning.
  try {
    finishInstall(config);
  } catch (e) {
    const error = errorMessage(e);
    logger.warn({ buildDir: config.buildDir, error }, 'install.cleanup.failed');
    print(out, `${symbols.warning} Could not remove ${config.buildDir}: ${error}`, 'yellow');
  }

  logger.info('install.completed');
  print(out, 'Finished installing pymode dependencies!', 'green');
  return { status: 'completed', manifestFile: recordManifest ? config.manifestFile : null, packages: installed };
}
