/**
 * Client configuration
 *
 * Connection settings come from MIRTH_* environment variables and can be
 * overridden per call (the CLI passes its flags as overrides).
 */

import { z } from 'zod';
import { MirthValidationError } from '../client/errors.js';

export const DEFAULT_BASE_URL = 'https://localhost:8443/api';
export const DEFAULT_TIMEOUT_MS = 30000;

const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

const envFlag = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  return !FALSE_VALUES.has(value.trim().toLowerCase());
}, z.boolean());

export const clientConfigSchema = z.object({
  url: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  username: z.string().min(1).optional(),
  password: z.string().optional(),
  verifySsl: envFlag.default(true),
  timeout: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export type ClientConfig = z.output<typeof clientConfigSchema>;
export type ClientConfigInput = z.input<typeof clientConfigSchema>;

function definedEntries(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Resolve client configuration from the environment plus explicit overrides.
 * Empty environment values are ignored.
 */
export function loadClientConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ClientConfigInput> = {}
): ClientConfig {
  const fromEnv = {
    url: env['MIRTH_URL'] || undefined,
    username: env['MIRTH_USERNAME'] || undefined,
    password: env['MIRTH_PASSWORD'] || undefined,
    verifySsl: env['MIRTH_VERIFY_SSL'] || undefined,
    timeout: env['MIRTH_TIMEOUT'] || undefined,
  };

  const result = clientConfigSchema.safeParse({
    url: DEFAULT_BASE_URL,
    ...definedEntries(fromEnv),
    ...definedEntries(overrides),
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new MirthValidationError(`Invalid client configuration: ${details}`);
  }

  return result.data;
}
