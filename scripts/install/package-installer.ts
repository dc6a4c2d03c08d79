import fs from 'node:fs';
import path from 'node:path';

import type { CommandRunner } from '../lib/process.js';
import type { Writer } from '../lib/output.js';
import { print } from '../utils.js';
import type { ArchiveDownloader } from './download.js';
import { CommandFailedError } from './errors.js';
import type { InstallLogger } from './logger.js';
import { expandTemplate, type AnyPackageSpec, type PackageCommand, type PackageSpec } from './packages.js';

export type PackageInstallContext = {
  installRoot: string;
  buildDir: string;
  /**
   * Environment handed to every command. Installers remove their stale keys
   * from it and add their exports to it, so later packages see them.
   */
  env: NodeJS.ProcessEnv;
  out: Writer;
  logger: InstallLogger;
  run: CommandRunner;
  download: ArchiveDownloader;
};

export type PackageInstallResult = {
  name: string;
  /** Git checkouts carry no pinned version. */
  version?: string;
  installRoot: string;
  exported: Record<string, string>;
};

const STEP_MESSAGES: Record<PackageCommand['step'], string | null> = {
  bootstrap: null,
  configure: 'Compiling',
  build: null,
  install: 'Installing',
  test: 'Testing'
};

async function runChecked(
  ctx: PackageInstallContext,
  file: string,
  args: string[],
  cwd: string
): Promise<void> {
  ctx.logger.debug({ cwd, command: [file, ...args].join(' ') }, 'install.command.start');
  const result = await ctx.run(file, args, { cwd, env: { ...ctx.env }, output: ctx.out });
  if (!result.ok) {
    throw new CommandFailedError(file, args, result);
  }
}

/**
 * Download and extract a release tarball into the build workspace.
 * Returns the archive path so it can be removed after the install.
 */
async function fetchArchive(spec: PackageSpec, ctx: PackageInstallContext): Promise<string> {
  print(ctx.out, `Downloading ${spec.name}...`, 'green');
  const archivePath = path.join(ctx.buildDir, spec.archiveFilename);
  const downloaded = await ctx.download(spec.downloadUrl, archivePath);
  ctx.logger.info({ name: spec.name, url: downloaded.url, bytes: downloaded.bytes }, 'install.package.downloaded');

  await runChecked(ctx, 'tar', ['xzf', spec.archiveFilename], ctx.buildDir);
  return archivePath;
}

/**
 * Fetch the sources, configure, build and install one package into
 * `ctx.installRoot`, then remove the sources (and the archive, if any).
 */
export async function installPackage(spec: AnyPackageSpec, ctx: PackageInstallContext): Promise<PackageInstallResult> {
  const { out, logger } = ctx;
  const vars = { PREFIX: ctx.installRoot };
  const version = spec.kind === 'archive' ? spec.version : undefined;

  logger.info({ name: spec.name, version }, 'install.package.start');

  for (const key of spec.sanitizeEnv) {
    if (ctx.env[key] !== undefined) {
      logger.info({ name: spec.name, key }, 'install.env.unset');
    }
    delete ctx.env[key];
  }

  const sourceDir = path.join(ctx.buildDir, spec.sourceDir);
  let archivePath: string | undefined;

  if (spec.kind === 'archive') {
    archivePath = await fetchArchive(spec, ctx);
  } else if (fs.existsSync(sourceDir)) {
    logger.info({ name: spec.name, sourceDir }, 'install.package.checkout_reused');
  } else {
    print(out, `Cloning ${spec.name}...`, 'green');
    await runChecked(ctx, 'git', ['clone', spec.repository, spec.sourceDir], ctx.buildDir);
  }

  for (const command of spec.commands) {
    const message = STEP_MESSAGES[command.step];
    if (message) print(out, `${message} ${spec.name}...`, 'green');
    const args = command.args.map((arg) => expandTemplate(arg, vars));
    await runChecked(ctx, command.file, args, sourceDir);
  }

  const exported: Record<string, string> = {};
  for (const [key, value] of Object.entries(spec.exportEnv)) {
    const expanded = expandTemplate(value, vars);
    exported[key] = expanded;
    ctx.env[key] = expanded;
  }
  if (Object.keys(exported).length > 0) {
    logger.info({ name: spec.name, ...exported }, 'install.env.export');
  }

  print(out, 'Cleaning up working directory...', 'green');
  fs.rmSync(sourceDir, { recursive: true, force: true });
  if (archivePath) fs.rmSync(archivePath, { force: true });

  logger.info({ name: spec.name }, 'install.package.ok');
  return { name: spec.name, version, installRoot: ctx.installRoot, exported };
}
