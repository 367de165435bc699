import { z } from 'zod';

/** `"true"`/`"1"`/`"yes"` and their negatives, case-insensitive. */
export const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

export const positiveInt = z.coerce.number().int().positive();

export type Env = Record<string, string | undefined>;

/** Treats empty strings as unset so `FOO=` falls back to the default. */
export function compactEnv(env: Env): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(scope: string, error: z.ZodError) {
    const issues = error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    super(`Invalid ${scope} configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
