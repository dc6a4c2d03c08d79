#!/usr/bin/env node

/**
 * Build ARPACK (arpack-ng, from git) and install it under the same prefix
 * as the other pymode dependencies. The manifest is left untouched.
 *
 *   $ pymode-deps-arpack                        # installs into ~/.pymode/
 *   $ pymode-deps-arpack --prefix=/opt/local/   # installs into /opt/local/
 *
 * Output is mirrored into ./install-arpack.log.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { runInstallCli } from './install/cli-main.js';
import { ARPACK_PACKAGES } from './install/packages.js';

function main(argv: string[] = process.argv): Promise<number> {
  return runInstallCli({
    scriptName: 'pymode-deps-arpack',
    description: 'Clone, build, check and install arpack-ng.',
    packages: ARPACK_PACKAGES,
    writeManifest: false,
    logFilename: 'install-arpack.log',
    argv
  });
}

if (process.argv[1] && fs.realpathSync(path.resolve(process.argv[1])) === fileURLToPath(import.meta.url)) {
  void main().then((code) => {
    process.exitCode = code;
  });
}

export { main };
