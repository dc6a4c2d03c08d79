/**
 * Package descriptors for the libraries the installer builds, in install order.
 *
 * Command arguments and exported values may reference `$PREFIX`, which is
 * replaced with the install root when the package is installed.
 */
import { z } from 'zod';

export const PETSC_VERSION = '3.12.1';
export const SLEPC_VERSION = '3.12.1';

const PackageCommandSchema = z.object({
  step: z.enum(['bootstrap', 'configure', 'build', 'test', 'install']),
  file: z.string().min(1),
  args: z.array(z.string())
});

const BuildRecipeSchema = z.object({
  name: z.string().min(1),
  /** Directory holding the sources, relative to the build workspace. */
  sourceDir: z.string().min(1),
  /** Variables removed from the environment before anything else runs. */
  sanitizeEnv: z.array(z.string()).default([]),
  commands: z.array(PackageCommandSchema).min(1),
  /** Variables published to the packages installed after this one. */
  exportEnv: z.record(z.string()).default({})
});

/** A released tarball, downloaded and extracted with tar. */
const PackageSpecSchema = BuildRecipeSchema.extend({
  kind: z.literal('archive').default('archive'),
  version: z.string().min(1),
  downloadUrl: z.string().url(),
  archiveFilename: z.string().min(1)
});

/** A git checkout of the default branch; an existing checkout is reused. */
const GitPackageSpecSchema = BuildRecipeSchema.extend({
  kind: z.literal('git'),
  repository: z.string().url()
});

export type PackageCommand = z.infer<typeof PackageCommandSchema>;
export type PackageSpec = z.infer<typeof PackageSpecSchema>;
export type GitPackageSpec = z.infer<typeof GitPackageSpecSchema>;
export type AnyPackageSpec = PackageSpec | GitPackageSpec;

export function definePackage(input: z.input<typeof PackageSpecSchema>): PackageSpec {
  return PackageSpecSchema.parse(input);
}

export function defineGitPackage(input: Omit<z.input<typeof GitPackageSpecSchema>, 'kind'>): GitPackageSpec {
  return GitPackageSpecSchema.parse({ ...input, kind: 'git' });
}

/**
 * Replace `$NAME` references with values from `vars`; unknown names are kept as is.
 */
export function expandTemplate(value: string, vars: Record<string, string>): string {
  return value.replace(/\$([A-Za-z_][A-Za-z0-9_]*)/g, (match: string, name: string) => vars[name] ?? match);
}

export const petsc = definePackage({
  name: 'PETSc',
  version: PETSC_VERSION,
  downloadUrl: `http://ftp.mcs.anl.gov/pub/petsc/release-snapshots/petsc-${PETSC_VERSION}.tar.gz`,
  archiveFilename: `petsc-${PETSC_VERSION}.tar.gz`,
  sourceDir: `petsc-${PETSC_VERSION}`,
  // A PETSC_DIR/PETSC_ARCH pointing at another tree breaks configure.
  sanitizeEnv: ['PETSC_DIR', 'PETSC_ARCH'],
  commands: [
    {
      step: 'configure',
      file: './configure',
      args: [
        '--with-scalar-type=complex',
        '--with-mpi=1',
        "--COPTFLAGS='-O3'",
        "--FOPTFLAGS='-O3'",
        "--CXXOPTFLAGS='-O3'",
        '--with-debugging=0',
        '--prefix=$PREFIX',
        '--download-scalapack',
        '--download-mumps',
        '--download-openblas'
      ]
    },
    { step: 'build', file: 'make', args: ['all', 'test'] },
    { step: 'install', file: 'make', args: ['install'] }
  ],
  exportEnv: { PETSC_DIR: '$PREFIX' }
});

export const slepc = definePackage({
  name: 'SLEPc',
  version: SLEPC_VERSION,
  downloadUrl: `http://slepc.upv.es/download/distrib/slepc-${SLEPC_VERSION}.tar.gz`,
  archiveFilename: `slepc-${SLEPC_VERSION}.tar.gz`,
  sourceDir: `slepc-${SLEPC_VERSION}`,
  sanitizeEnv: ['SLEPC_DIR'],
  commands: [
    { step: 'configure', file: './configure', args: ['--prefix=$PREFIX'] },
    { step: 'build', file: 'make', args: ['all'] },
    { step: 'install', file: 'make', args: ['install'] },
    { step: 'test', file: 'make', args: ['test'] }
  ]
});

/** SLEPc's configure finds PETSc through the PETSC_DIR exported by the PETSc install. */
export const DEFAULT_PACKAGES: readonly AnyPackageSpec[] = [petsc, slepc];

export const arpack = defineGitPackage({
  name: 'ARPACK',
  repository: 'https://github.com/opencollab/arpack-ng.git',
  sourceDir: 'arpack-ng',
  commands: [
    { step: 'bootstrap', file: 'sh', args: ['bootstrap'] },
    { step: 'configure', file: './configure', args: ['--prefix=$PREFIX'] },
    { step: 'build', file: 'make', args: [] },
    { step: 'test', file: 'make', args: ['check'] },
    { step: 'install', file: 'make', args: ['install'] }
  ]
});

/** Installed on its own by `pymode-deps-arpack`, as an alternative eigensolver backend. */
export const ARPACK_PACKAGES: readonly AnyPackageSpec[] = [arpack];
