import type { Secret } from '../engine/secret';

export const SOURCE_TYPES = ['sql_desktop', 'saas_api'] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];

export const SQL_DRIVERS = ['pg', 'better-sqlite3'] as const;

export type SqlDriver = (typeof SQL_DRIVERS)[number];

export type StorageTarget = {
  readonly bucketName: string;
  /** Path to the storage credentials file; opaque to everything but the sink */
  readonly credentialsPath: string;
};

/**
 * One thing to read from a SQL source. A `primaryKey` enables keyset
 * pagination; without one the rows are streamed from a single statement.
 */
export type SqlDataset =
  | { readonly kind: 'table'; readonly name: string; readonly primaryKey?: string }
  | { readonly kind: 'query'; readonly sql: string; readonly primaryKey?: string };

export type SqlDesktopConnection = {
  readonly dsn: Secret;
  readonly driver: SqlDriver;
  /** Read in order; each becomes its own storage dataset */
  readonly datasets: readonly SqlDataset[];
  readonly batchSize: number;
};

export type SaasObject = {
  readonly name: string;
  readonly path: string;
  readonly properties: readonly string[];
};

export type SaasApiConnection = {
  readonly baseUrl: string;
  readonly apiKey: Secret;
  readonly objects: readonly SaasObject[];
  readonly pageSize: number;
  readonly maxRetries: number;
  readonly retryBaseMs: number;
};

export type SqlDesktopSpec = {
  readonly name: string;
  readonly sourceType: 'sql_desktop';
  readonly connection: SqlDesktopConnection;
};

export type SaasApiSpec = {
  readonly name: string;
  readonly sourceType: 'saas_api';
  readonly connection: SaasApiConnection;
};

export type SourceSpec = SqlDesktopSpec | SaasApiSpec;

export type SpecOf<K extends SourceType> = Extract<SourceSpec, { sourceType: K }>;

export type Config = {
  /** Per-client prefix under which every source writes */
  readonly client: string;
  readonly storage: StorageTarget;
  readonly sources: readonly SourceSpec[];
};

export const secretsOf = (spec: SourceSpec): Secret[] => {
  switch (spec.sourceType) {
    case 'sql_desktop':
      return [spec.connection.dsn];
    case 'saas_api':
      return [spec.connection.apiKey];
  }
};
