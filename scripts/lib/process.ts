import { execa, type Options as ExecaOptions } from 'execa';

import type { Writer } from './output.js';

export type ExecOptions = ExecaOptions & {
  /** Stream the command's stdout and stderr into this writer instead of buffering them. */
  output?: Writer;
};

export type ExecResult = {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
};

/**
 * Runs one external command to completion. Never throws for a non-zero exit:
 * callers inspect `ok`.
 */
export type CommandRunner = (file: string, args: string[], options?: ExecOptions) => Promise<ExecResult>;

function normalizeText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return String(value).trim();
}

export async function execCmd(
  file: string,
  args: string[] = [],
  options: ExecOptions = {}
): Promise<ExecResult> {
  const { output, ...execaOptions } = options;

  const subprocess = execa(file, args, {
    encoding: 'utf8',
    reject: false,
    buffer: output === undefined,
    // An explicit env is the whole environment: keys removed from it must stay removed.
    extendEnv: execaOptions.env === undefined,
    ...execaOptions
  });

  if (output) {
    // Decode per stream so a character split across two reads stays whole.
    for (const stream of [subprocess.stdout, subprocess.stderr]) {
      stream?.setEncoding('utf8');
      stream?.on('data', (chunk: string) => output.write(chunk));
    }
  }

  const res = await subprocess;

  return {
    ok: (res.exitCode ?? 1) === 0,
    exitCode: res.exitCode ?? 1,
    stdout: normalizeText(res.stdout),
    stderr: normalizeText(res.stderr)
  };
}
