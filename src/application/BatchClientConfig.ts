/** Everything the batch client needs to talk to the provider. */
export interface BatchClientConfig {
  readonly endpoint: string;
  readonly apiVersion: string;
  /** Query parameter that carries the credential, e.g. `subscription-key`. */
  readonly credentialParam: string;
  readonly credential: string;
  readonly countrySet: string;
  /** Maximum rows per provider job. */
  readonly batchSize: number;
  readonly pollFloorMs: number;
  readonly pollMaxSleepMs: number;
  /** Per-batch budget for the poll loop. */
  readonly pollCeilingMs: number;
  readonly transientRetryMs: number;
  readonly requestTimeoutMs: number;
  /** Headers checked, in order, for the continuation URL. */
  readonly continuationHeaders: readonly string[];
  /** Body paths checked, in order, for the provider's job state. */
  readonly stateFields: readonly (readonly string[])[];
}

export const DEFAULT_CLIENT_CONFIG: Omit<BatchClientConfig, 'credential'> = {
  endpoint: 'https://atlas.microsoft.com/search/address/batch/json',
  apiVersion: '1.0',
  credentialParam: 'subscription-key',
  countrySet: 'US',
  batchSize: 100,
  pollFloorMs: 2_000,
  pollMaxSleepMs: 15_000,
  pollCeilingMs: 30 * 60_000,
  transientRetryMs: 3_000,
  requestTimeoutMs: 60_000,
  continuationHeaders: ['Location', 'Operation-Location'],
  stateFields: [['summary', 'state'], ['status']],
};
