#!/usr/bin/env node

/**
 * Download, compile and install the numerical libraries pymode builds
 * against (PETSc, then SLEPc), and record where they went in ~/.pymode_deps.
 *
 *   $ pymode-deps                        # installs into ~/.pymode/
 *   $ pymode-deps --prefix=/opt/local/   # installs into /opt/local/
 *
 * Everything printed once the log is open is mirrored into ./install.log;
 * argument errors reported by yargs go to the terminal only.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { runInstallCli } from './install/cli-main.js';
import { DEFAULT_PACKAGES } from './install/packages.js';

function main(argv: string[] = process.argv): Promise<number> {
  return runInstallCli({
    scriptName: 'pymode-deps',
    description: 'Download, build and install PETSc and SLEPc.',
    packages: DEFAULT_PACKAGES,
    writeManifest: true,
    argv
  });
}

// Resolve symlinks so the check also holds when run through an npm bin link.
if (process.argv[1] && fs.realpathSync(path.resolve(process.argv[1])) === fileURLToPath(import.meta.url)) {
  void main().then((code) => {
    process.exitCode = code;
  });
}

export { main };
