import { z } from 'zod';
import type { BatchClientConfig } from '../../application/BatchClientConfig.js';
import type { ResultColumns } from '../../domain/model/ResultColumns.js';
import { DEFAULT_CLIENT_CONFIG } from '../../application/BatchClientConfig.js';
import { DEFAULT_RESULT_COLUMNS } from '../../domain/model/ResultColumns.js';
import { ConfigError } from '../../domain/errors/GeocodeErrors.js';

export const CREDENTIAL_ENV = 'AZURE_MAPS_KEY';
export const DEFAULT_SHEET_NAME = 'Locations';

/** Fully resolved settings for one run. */
export interface GeocoderConfig {
  readonly client: BatchClientConfig;
  readonly columns: ResultColumns;
  readonly sheetName: string;
}

/** Values a caller (usually the CLI) may set on top of the environment. */
export interface ConfigOverrides {
  readonly sheetName?: string;
  readonly columns?: Partial<ResultColumns>;
  readonly client?: Partial<Omit<BatchClientConfig, 'credential'>>;
}

const D = DEFAULT_CLIENT_CONFIG;

const positiveInt = z.coerce.number().int().positive();
const optionalPositiveInt = z.preprocess((value) => (value === '' ? undefined : value), positiveInt.optional());

const envSchema = z.object({
  [CREDENTIAL_ENV]: z
    .string({ required_error: `${CREDENTIAL_ENV} environment variable is not set.` })
    .trim()
    .min(1, `${CREDENTIAL_ENV} environment variable is not set.`),
  GEOCODE_BATCH_SIZE: optionalPositiveInt,
  GEOCODE_POLL_FLOOR_MS: optionalPositiveInt,
  GEOCODE_POLL_CEILING_MS: optionalPositiveInt,
});

// Unset fields fall back to the provider defaults.
const clientSchema = z.object({
  endpoint: z.string().url().default(D.endpoint),
  apiVersion: z.string().min(1).default(D.apiVersion),
  credentialParam: z.string().min(1).default(D.credentialParam),
  credential: z.string().min(1),
  countrySet: z.string().min(1).default(D.countrySet),
  batchSize: z.number().int().positive().default(D.batchSize),
  pollFloorMs: z.number().int().nonnegative().default(D.pollFloorMs),
  pollMaxSleepMs: z.number().int().positive().default(D.pollMaxSleepMs),
  pollCeilingMs: z.number().int().positive().default(D.pollCeilingMs),
  transientRetryMs: z.number().int().nonnegative().default(D.transientRetryMs),
  requestTimeoutMs: z.number().int().positive().default(D.requestTimeoutMs),
  continuationHeaders: z
    .array(z.string().min(1))
    .min(1)
    .default(() => [...D.continuationHeaders]),
  stateFields: z
    .array(z.array(z.string().min(1)).min(1))
    .min(1)
    .default(() => D.stateFields.map((path) => [...path])),
});

const columnsSchema = z.object({
  address: z.string().min(1).default(DEFAULT_RESULT_COLUMNS.address),
  latitude: z.string().min(1).default(DEFAULT_RESULT_COLUMNS.latitude),
  longitude: z.string().min(1).default(DEFAULT_RESULT_COLUMNS.longitude),
  matchStatus: z.string().min(1).default(DEFAULT_RESULT_COLUMNS.matchStatus),
  confidence: z.string().min(1).default(DEFAULT_RESULT_COLUMNS.confidence),
});

/**
 * Resolve the run configuration from environment variables and overrides.
 *
 * Throws `ConfigError` when the credential is missing or any value is out of
 * range. Nothing here touches the network.
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>>,
  overrides: ConfigOverrides = {},
): GeocoderConfig {
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw toConfigError(parsedEnv.error);
  }
  const vars = parsedEnv.data;

  const client = clientSchema.safeParse({
    batchSize: vars.GEOCODE_BATCH_SIZE,
    pollFloorMs: vars.GEOCODE_POLL_FLOOR_MS,
    pollCeilingMs: vars.GEOCODE_POLL_CEILING_MS,
    ...withoutUndefined(overrides.client ?? {}),
    credential: vars[CREDENTIAL_ENV],
  });
  if (!client.success) {
    throw toConfigError(client.error);
  }

  const columns = columnsSchema.safeParse(overrides.columns ?? {});
  if (!columns.success) {
    throw toConfigError(columns.error);
  }

  const sheetName = overrides.sheetName?.trim() || DEFAULT_SHEET_NAME;

  return { client: client.data, columns: columns.data, sheetName };
}

function toConfigError(error: z.ZodError): ConfigError {
  const first = error.issues[0];
  const key = first?.path.join('.');
  const message = error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path === '' || issue.message.startsWith(path) ? issue.message : `${path}: ${issue.message}`;
    })
    .join('; ');
  return new ConfigError(message, key);
}

// An override left undefined must not mask the environment value.
function withoutUndefined(values: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}
