/**
 * The dependency manifest (`~/.pymode_deps`) tells the pymode build where
 * PETSc and SLEPc were installed. Plain `KEY=VALUE` lines, no escaping.
 */
import fs from 'node:fs';
import { z } from 'zod';

const InstallationManifestSchema = z.object({
  PETSC_DIR: z.string(),
  PETSC_ARCH: z.string(),
  SLEPC_DIR: z.string()
});

export type InstallationManifest = {
  petscDir: string;
  petscArch: string;
  slepcDir: string;
};

export function manifestForInstallRoot(installRoot: string): InstallationManifest {
  return { petscDir: installRoot, petscArch: '', slepcDir: installRoot };
}

export function formatManifest(manifest: InstallationManifest): string {
  return (
    `PETSC_DIR=${manifest.petscDir}\n` +
    `PETSC_ARCH=${manifest.petscArch}\n` +
    `SLEPC_DIR=${manifest.slepcDir}\n`
  );
}

/**
 * Write the manifest, replacing whatever the file held before.
 */
export function writeManifest(filePath: string, manifest: InstallationManifest): void {
  fs.writeFileSync(filePath, formatManifest(manifest), 'utf8');
}

export function parseManifest(content: string): InstallationManifest {
  const entries: Record<string, string> = {};
  for (const line of content.split('\n')) {
    if (!line) continue;
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    entries[line.slice(0, eq)] = line.slice(eq + 1);
  }

  const parsed = InstallationManifestSchema.parse(entries);
  return { petscDir: parsed.PETSC_DIR, petscArch: parsed.PETSC_ARCH, slepcDir: parsed.SLEPC_DIR };
}

export function readManifest(filePath: string): InstallationManifest {
  return parseManifest(fs.readFileSync(filePath, 'utf8'));
}
