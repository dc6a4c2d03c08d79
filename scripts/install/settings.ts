/**
 * Installer settings read from the environment.
 */
import { z } from 'zod';

import { SettingsError } from './errors.js';

const InstallSettingsSchema = z.object({
  PYMODE_DEPS_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

export type InstallSettings = {
  logLevel: z.infer<typeof InstallSettingsSchema>['PYMODE_DEPS_LOG_LEVEL'];
};

export function loadInstallSettings(env: NodeJS.ProcessEnv = process.env): InstallSettings {
  const raw = {
    // Treat an empty value the same as an unset one.
    PYMODE_DEPS_LOG_LEVEL: env.PYMODE_DEPS_LOG_LEVEL?.trim() || undefined
  };
  const parsed = InstallSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue?.path.join('.') || 'environment';
    throw new SettingsError(`Invalid ${name}: ${issue?.message ?? 'invalid value'}`);
  }
  return { logLevel: parsed.data.PYMODE_DEPS_LOG_LEVEL };
}
