import z from 'zod';
import { ConfigurationError } from '../error/configurationError.js';
import { ValidationError } from '../error/validationError.js';
import type { ClientInput, MailClientOptions, MailConfig } from './types.js';

/** Defaults every client starts from on its first configuration. */
export const DEFAULT_OPTIONS: Readonly<MailConfig> = Object.freeze({
  host: 'api.sparkpost.com',
  protocol: 'https',
  port: 443,
  key: '',
  version: 'v1',
  async: true,
});

/** Recognized option keys and their value types; unknown keys are stripped on parse. */
const optionsSchema = z
  .object({
    host: z.string(),
    protocol: z.string(),
    port: z.union([z.number().int().nonnegative(), z.literal(false), z.null()]),
    key: z.string(),
    version: z.string(),
    async: z.boolean(),
  })
  .partial();

/** Whether the key holds at least one non-whitespace character. */
function isUsableKey(key: string | undefined): key is string {
  return key !== undefined && /\S/.test(key);
}

/**
 * Resolves a constructor/setOptions input into recognized option overrides.
 * A bare string is the API key.
 */
function toOverrides(input: ClientInput): MailClientOptions {
  const raw = typeof input === 'string' ? { key: input } : input;
  const parsed = optionsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError('error invalid client options', {
      cause: new ValidationError('error validating client options', parsed.error.issues),
    });
  }

  return parsed.data;
}

/**
 * Merges option overrides into the current configuration.
 *
 * On the first configuration (`current` is null) the merge starts from {@link DEFAULT_OPTIONS} and a usable
 * key is required. Later merges start from `current`, so partial updates keep earlier customizations;
 * they only check the key when one is passed explicitly.
 *
 * @throws {ConfigurationError} when no usable key is present or a recognized option has the wrong type.
 */
export function mergeOptions(current: Readonly<MailConfig> | null, input: ClientInput): MailConfig {
  const overrides = toOverrides(input);

  if (!current && !isUsableKey(overrides.key)) {
    throw new ConfigurationError('You must provide an API key');
  }

  if (current && overrides.key !== undefined && !isUsableKey(overrides.key)) {
    throw new ConfigurationError('error API key cannot be blank');
  }

  const merged: MailConfig = { ...(current ?? DEFAULT_OPTIONS) };
  for (const [name, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [name]: value });
    }
  }

  return merged;
}
