import { z } from 'zod';
import { Secret } from '../engine/secret';
import { SQL_DRIVERS, type Config, type SourceSpec, type SqlDataset } from './types';

const DEFAULT_CLIENT = 'default';

const nonEmpty = z.string().trim().min(1);

// Source names become storage key segments
const sourceName = nonEmpty.regex(/^[A-Za-z0-9._-]+$/, 'may only contain letters, digits, ".", "_" and "-"');

const StorageSchema = z.object({
  bucket_name: nonEmpty,
  credentials_path: nonEmpty,
});

// Table names become dataset key segments too
const SqlTableSchema = z.union([
  sourceName.transform((name) => ({ name, primary_key: undefined })),
  z.object({
    name: sourceName,
    primary_key: nonEmpty.optional(),
  }),
]);

const SqlDesktopSchema = z.object({
  name: sourceName,
  source_type: z.literal('sql_desktop'),
  dsn: nonEmpty,
  driver: z.enum(SQL_DRIVERS).default('pg'),
  table: sourceName.optional(),
  tables: z.array(SqlTableSchema).min(1).optional(),
  query: nonEmpty.optional(),
  primary_key: nonEmpty.optional(),
  batch_size: z.number().int().min(1).max(10_000).default(1000),
});

const SaasObjectSchema = z.union([
  sourceName.transform((name) => ({ name, path: undefined, properties: [] })),
  z.object({
    name: sourceName,
    path: z.string().startsWith('/').optional(),
    properties: z.array(nonEmpty).default([]),
  }),
]);

const SaasApiSchema = z.object({
  name: sourceName,
  source_type: z.literal('saas_api'),
  base_url: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  api_key: nonEmpty,
  objects: z.array(SaasObjectSchema).min(1),
  page_size: z.number().int().min(1).max(1000).default(100),
  max_retries: z.number().int().min(0).max(10).default(5),
  retry_base_ms: z.number().int().min(0).max(60_000).default(1000),
});

const SourceSchema = z.discriminatedUnion('source_type', [SqlDesktopSchema, SaasApiSchema]);

type RawSource = z.infer<typeof SourceSchema>;
type RawSqlDesktop = z.infer<typeof SqlDesktopSchema>;

const toDatasets = (raw: RawSqlDesktop): SqlDataset[] => {
  if (raw.query !== undefined) {
    return [{ kind: 'query', sql: raw.query, primaryKey: raw.primary_key }];
  }
  if (raw.tables !== undefined) {
    return raw.tables.map((t) => ({ kind: 'table', name: t.name, primaryKey: t.primary_key }));
  }
  return raw.table === undefined ? [] : [{ kind: 'table', name: raw.table, primaryKey: raw.primary_key }];
};

const checkSqlDesktop = (source: RawSqlDesktop, index: number, ctx: z.RefinementCtx): void => {
  const given = [source.table, source.tables, source.query].filter((v) => v !== undefined);
  if (given.length !== 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['sources', index],
      message: 'exactly one of "table", "tables" or "query" is required',
    });
  }
  if (source.tables === undefined) return;

  if (source.primary_key !== undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['sources', index, 'primary_key'],
      message: 'set "primary_key" on each "tables" entry instead',
    });
  }
  const seen = new Set<string>();
  source.tables.forEach((table, position) => {
    if (seen.has(table.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sources', index, 'tables', position],
        message: `duplicate table "${table.name}"`,
      });
    }
    seen.add(table.name);
  });
};

const toSourceSpec = (raw: RawSource): SourceSpec => {
  if (raw.source_type === 'sql_desktop') {
    return {
      name: raw.name,
      sourceType: 'sql_desktop',
      connection: {
        dsn: new Secret(raw.dsn),
        driver: raw.driver,
        datasets: toDatasets(raw),
        batchSize: raw.batch_size,
      },
    };
  }

  return {
    name: raw.name,
    sourceType: 'saas_api',
    connection: {
      baseUrl: raw.base_url,
      apiKey: new Secret(raw.api_key),
      objects: raw.objects.map((o) => ({
        name: o.name,
        path: o.path ?? `/crm/v3/objects/${o.name}`,
        properties: o.properties,
      })),
      pageSize: raw.page_size,
      maxRetries: raw.max_retries,
      retryBaseMs: raw.retry_base_ms,
    },
  };
};

export const ConfigSchema = z
  .object({
    client: sourceName.default(DEFAULT_CLIENT),
    storage: StorageSchema,
    sources: z.array(SourceSchema),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.sources.forEach((source, index) => {
      if (source.source_type === 'sql_desktop') {
        checkSqlDesktop(source, index, ctx);
      }
      if (seen.has(source.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sources', index, 'name'],
          message: `duplicate source name "${source.name}"`,
        });
      }
      seen.add(source.name);
    });
  })
  .transform(
    (raw): Config => ({
      client: raw.client,
      storage: { bucketName: raw.storage.bucket_name, credentialsPath: raw.storage.credentials_path },
      sources: raw.sources.map(toSourceSpec),
    })
  );

const StorageCredentialsSchema = z.object({
  region: nonEmpty,
  access_key_id: nonEmpty.optional(),
  secret_access_key: nonEmpty.optional(),
  session_token: nonEmpty.optional(),
  endpoint: z.string().url().optional(),
  force_path_style: z.boolean().default(false),
});

export type StorageCredentials = {
  readonly region: string;
  readonly keys?: {
    readonly accessKeyId: string;
    readonly secretAccessKey: Secret;
    readonly sessionToken?: Secret;
  };
  readonly endpoint?: string;
  readonly forcePathStyle: boolean;
};

export const StorageCredentialsFileSchema = StorageCredentialsSchema.refine(
  (c) => (c.access_key_id === undefined) === (c.secret_access_key === undefined),
  { message: '"access_key_id" and "secret_access_key" must be given together' }
).transform(
  (raw): StorageCredentials => ({
    region: raw.region,
    keys:
      raw.access_key_id !== undefined && raw.secret_access_key !== undefined
        ? {
            accessKeyId: raw.access_key_id,
            secretAccessKey: new Secret(raw.secret_access_key),
            sessionToken: raw.session_token === undefined ? undefined : new Secret(raw.session_token),
          }
        : undefined,
    endpoint: raw.endpoint,
    forcePathStyle: raw.force_path_style,
  })
);

/** Flatten zod issues into one readable line; never echoes input values. */
export const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
