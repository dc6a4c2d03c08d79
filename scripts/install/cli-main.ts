import type { Writer } from '../lib/output.js';
import { errorMessage, print, symbols } from '../utils.js';
import { parseInstallFlags, resolveInstallConfig } from './cli-runtime.js';
import { createInstallLogger, createInstallOutput } from './logger.js';
import type { AnyPackageSpec } from './packages.js';
import { runInstall, type InstallDeps } from './runner.js';
import { loadInstallSettings } from './settings.js';

export type InstallCliParams = {
  scriptName: string;
  description: string;
  packages: readonly AnyPackageSpec[];
  writeManifest: boolean;
  logFilename?: string;
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  startDir?: string;
  terminal?: NodeJS.WritableStream;
  deps?: Pick<InstallDeps, 'run' | 'download'>;
};

/**
 * Shared `main` of the installer entry points. Resolves to the process exit
 * code: 0 when every package is installed, 1 otherwise.
 */
export async function runInstallCli(params: InstallCliParams): Promise<number> {
  const env = params.env ?? process.env;
  let out: Writer | undefined;

  try {
    const flags = parseInstallFlags(params.argv ?? process.argv, {
      scriptName: params.scriptName,
      description: params.description
    });
    const config = resolveInstallConfig({
      prefix: flags.prefix,
      homeDir: params.homeDir,
      startDir: params.startDir,
      logFilename: params.logFilename
    });

    out = createInstallOutput({ logFile: config.logFile, terminal: params.terminal });
    if (flags.prefix !== undefined) {
      print(out, config.installRoot);
    }

    const settings = loadInstallSettings(env);
    const logger = createInstallLogger(out, { level: settings.logLevel });

    const result = await runInstall({
      config,
      out,
      logger,
      env,
      writeManifest: params.writeManifest,
      deps: { ...params.deps, packages: params.packages }
    });
    return result.status === 'completed' ? 0 : 1;
  } catch (error) {
    const line = `${symbols.error} Fatal error: ${errorMessage(error)}`;
    // Before the log exists there is only stderr.
    if (out) print(out, line, 'red');
    else console.error(line);
    return 1;
  }
}
