import { Effect, Either, pipe, Schema } from 'effect';
import { ConfigurationError } from './errors.js';

/**
 * Schema for the Confluence REST root (e.g. https://wiki.example.com/rest/api)
 */
const ApiUrlSchema = Schema.String.pipe(
  Schema.pattern(/^https?:\/\/[^\s/]+/),
  Schema.annotations({
    message: () => 'API URL must be an http(s) URL (e.g. https://wiki.example.com/rest/api)',
  }),
);

/**
 * Configuration schema for a publishing run
 */
const RunConfigSchema = Schema.Struct({
  apiUrl: ApiUrlSchema,
  username: Schema.optional(Schema.String),
  password: Schema.String.pipe(Schema.minLength(1)),
  space: Schema.String.pipe(Schema.minLength(1)),
  ancestorId: Schema.optional(Schema.String),
  globalLabel: Schema.optional(Schema.String),
  headers: Schema.Record({ key: Schema.String, value: Schema.String }),
  dryRun: Schema.Boolean,
});

export type RunConfig = Schema.Schema.Type<typeof RunConfigSchema>;

/**
 * Values taken from the command line. Anything left undefined falls back to
 * the matching CONFLUENCE_* environment variable.
 */
export interface ConfigFlags {
  apiUrl?: string;
  username?: string;
  password?: string;
  space?: string;
  ancestorId?: string;
  globalLabel?: string;
  headers?: string[];
  dryRun?: boolean;
}

export const ENV_VARS = {
  apiUrl: 'CONFLUENCE_API_URL',
  username: 'CONFLUENCE_USERNAME',
  password: 'CONFLUENCE_PASSWORD',
  space: 'CONFLUENCE_SPACE',
  ancestorId: 'CONFLUENCE_ANCESTOR_ID',
  globalLabel: 'CONFLUENCE_GLOBAL_LABEL',
} as const;

export const HEADER_ENV_PREFIX = 'CONFLUENCE_HEADER_';

// Container images commonly declare these variables with empty defaults
function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== '')?.trim();
}

// RFC 9110 token characters
const HEADER_NAME = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

/**
 * Parse a header flag. NAME=VALUE and NAME: VALUE split on whichever
 * separator comes first; a bare NAME sends an empty value.
 */
export function parseHeader(raw: string): [string, string] {
  const separator = raw.search(/[=:]/);
  const name = (separator === -1 ? raw : raw.slice(0, separator)).trim();
  const value = separator === -1 ? '' : raw.slice(separator + 1).trim();
  if (!HEADER_NAME.test(name)) {
    throw new ConfigurationError(`Invalid header "${raw}". Expected NAME=VALUE.`);
  }
  return [name, value];
}

/**
 * Collect extra headers from CONFLUENCE_HEADER_<NAME> variables
 */
export function getEnvironmentHeaders(env: NodeJS.ProcessEnv): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(HEADER_ENV_PREFIX) && key.length > HEADER_ENV_PREFIX.length && value !== undefined) {
      const name = key.slice(HEADER_ENV_PREFIX.length);
      if (!HEADER_NAME.test(name)) {
        throw new ConfigurationError(`Invalid header name "${name}" in ${key}`);
      }
      headers[name] = value;
    }
  }
  return headers;
}

/**
 * Effect-based configuration resolution: flags first, then environment
 */
export function resolveConfigEffect(
  flags: ConfigFlags,
  env: NodeJS.ProcessEnv = process.env,
): Effect.Effect<RunConfig, ConfigurationError> {
  return pipe(
    Effect.try({
      try: () => {
        const headers = getEnvironmentHeaders(env);
        for (const raw of flags.headers ?? []) {
          const [name, value] = parseHeader(raw);
          headers[name] = value;
        }

        const apiUrl = firstNonEmpty(flags.apiUrl, env[ENV_VARS.apiUrl]);
        return {
          apiUrl: apiUrl?.replace(/\/+$/, ''),
          username: firstNonEmpty(flags.username, env[ENV_VARS.username]),
          password: firstNonEmpty(flags.password, env[ENV_VARS.password]),
          space: firstNonEmpty(flags.space, env[ENV_VARS.space]),
          ancestorId: firstNonEmpty(flags.ancestorId, env[ENV_VARS.ancestorId]),
          globalLabel: firstNonEmpty(flags.globalLabel, env[ENV_VARS.globalLabel]),
          headers,
          dryRun: flags.dryRun ?? false,
        };
      },
      catch: (error) =>
        error instanceof ConfigurationError ? error : new ConfigurationError(`Invalid configuration: ${error}`),
    }),
    Effect.flatMap((candidate) => {
      const missing: string[] = [];
      if (!candidate.apiUrl) missing.push(`--api_url (${ENV_VARS.apiUrl})`);
      if (!candidate.space) missing.push(`--space (${ENV_VARS.space})`);
      if (!candidate.password) missing.push(`--password (${ENV_VARS.password})`);
      if (missing.length > 0) {
        return Effect.fail(new ConfigurationError(`Missing required configuration: ${missing.join(', ')}`));
      }
      return Schema.decodeUnknown(RunConfigSchema)(candidate).pipe(
        Effect.mapError((error) => new ConfigurationError(`Invalid configuration: ${error.message}`)),
      );
    }),
  );
}

/**
 * Synchronous wrapper for resolveConfigEffect; throws ConfigurationError
 */
export function resolveConfig(flags: ConfigFlags, env: NodeJS.ProcessEnv = process.env): RunConfig {
  const result = Effect.runSync(Effect.either(resolveConfigEffect(flags, env)));
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
