import Knex, { type Knex as KnexType } from 'knex';
import type { SqlDataset, SqlDesktopConnection, SqlDesktopSpec } from '../../config/types';
import type { ConnectorHandle, SourceConnector } from '../source';
import { ExtractionHandle } from '../../engine/cursor';
import { ConnectionError, ExtractionError } from '../../engine/errors';
import { log, formatDbError } from '../../engine/logger';
import { redact } from '../../engine/secret';
import type { Batch, ExtractedRecord } from '../../engine/types';

const SUBQUERY_ALIAS = 'extract_source';
const CURSOR_NAME = 'bucketsync_extract';
const ROWID_ALIAS = '_bucketsync_rowid';

type KeyValue = string | number | Date;

const isSqlite = (connection: SqlDesktopConnection): boolean => connection.driver === 'better-sqlite3';

const datasetName = (dataset: SqlDataset): string => (dataset.kind === 'table' ? dataset.name : 'query');

const createClient = (connection: SqlDesktopConnection): KnexType => {
  const dsn = connection.dsn.reveal();

  return Knex({
    client: connection.driver,
    connection: isSqlite(connection) ? { filename: dsn } : dsn,
    useNullAsDefault: isSqlite(connection),
    pool: isSqlite(connection) ? { min: 1, max: 1 } : { min: 0, max: 1 },
    acquireConnectionTimeout: 10_000,
    log: {
      warn(message: string) {
        log.knex.warn(redact(message, [connection.dsn]));
      },
      error(message: string) {
        log.knex.error(redact(message, [connection.dsn]));
      },
      deprecate(message: string) {
        log.knex.warn(message);
      },
      debug() {},
    },
  });
};

const isRecord = (value: unknown): value is ExtractedRecord =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

/** Rows of a builder result (an array) or of a pg `raw` result (`{ rows }`) */
const toRecords = (sourceName: string, result: unknown): ExtractedRecord[] => {
  const rows = isRecord(result) ? result.rows : result;
  if (!Array.isArray(rows)) {
    throw new ExtractionError(sourceName, 'driver returned a non-array result');
  }
  return rows.map((row) => {
    if (!isRecord(row)) {
      throw new ExtractionError(sourceName, 'driver returned a non-object row');
    }
    return row;
  });
};

const withoutRowid = (row: ExtractedRecord): ExtractedRecord =>
  Object.fromEntries(Object.entries(row).filter(([column]) => column !== ROWID_ALIAS));

const toKeyValue = (sourceName: string, column: string, value: unknown): KeyValue => {
  if (typeof value === 'string' || typeof value === 'number' || value instanceof Date) {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  throw new ExtractionError(sourceName, `primary key column "${column}" holds a non-comparable value`);
};

/**
 * Open handle over a desktop/SQL database.
 * Reads each dataset in bounded windows of rows, in configured order:
 * keyset pages when a primary key is known, otherwise a pg server-side
 * cursor, or SQLite's implicit rowid for tables.
 */
class SqlDesktopHandle extends ExtractionHandle implements ConnectorHandle {
  private closed = false;

  constructor(
    private readonly spec: SqlDesktopSpec,
    private readonly client: KnexType
  ) {
    super(spec.name);
  }

  private from(dataset: SqlDataset): string | KnexType.Raw {
    return dataset.kind === 'query' ? this.client.raw(`(${dataset.sql}) as ${SUBQUERY_ALIAS}`) : dataset.name;
  }

  private async attempt<T>(work: PromiseLike<T>, dataset: SqlDataset, row: number): Promise<T> {
    try {
      return await work;
    } catch (err) {
      const detail = redact(formatDbError(err), [this.spec.connection.dsn]);
      throw new ExtractionError(this.sourceName, `query on ${datasetName(dataset)} failed at row ${row}: ${detail}`, {
        cause: err,
      });
    }
  }

  /** `where key > last order by key limit n` windows; `rowid` reads SQLite's implicit key. */
  private async *readKeyset(
    dataset: SqlDataset,
    key: string,
    rowid: boolean
  ): AsyncGenerator<ExtractedRecord[], void, undefined> {
    const { batchSize } = this.spec.connection;
    const keyField = rowid ? ROWID_ALIAS : key;
    let lastKey: KeyValue | undefined;
    let read = 0;

    while (true) {
      const builder = this.client.queryBuilder().from(this.from(dataset));
      if (rowid) {
        builder.select(this.client.raw('rowid as ??', [ROWID_ALIAS]), '*');
      } else {
        builder.select('*');
      }
      if (lastKey !== undefined) {
        builder.where(key, '>', lastKey);
      }
      builder.orderBy(key).limit(batchSize);

      const rows = toRecords(this.sourceName, await this.attempt(builder, dataset, read));
      if (rows.length === 0) return;

      read += rows.length;
      const last = rows[rows.length - 1];
      yield rowid ? rows.map(withoutRowid) : rows;

      if (rows.length < batchSize) return;
      lastKey = toKeyValue(this.sourceName, key, last[keyField]);
    }
  }

  /** One pg statement read through a server-side cursor, `batchSize` rows per FETCH. */
  private async *readCursor(dataset: SqlDataset): AsyncGenerator<ExtractedRecord[], void, undefined> {
    const { batchSize } = this.spec.connection;
    const statement =
      dataset.kind === 'query' ? dataset.sql : this.client.queryBuilder().select('*').from(dataset.name).toQuery();
    const trx = await this.attempt(this.client.transaction(), dataset, 0);
    let read = 0;

    try {
      await this.attempt(trx.raw(`declare ${CURSOR_NAME} no scroll cursor for ${statement}`), dataset, read);
      while (true) {
        const fetched: unknown = await this.attempt(
          trx.raw(`fetch forward ${batchSize} from ${CURSOR_NAME}`),
          dataset,
          read
        );
        const rows = toRecords(this.sourceName, fetched);
        if (rows.length === 0) return;

        read += rows.length;
        yield rows;

        if (rows.length < batchSize) return;
      }
    } finally {
      await trx.rollback().catch((err: unknown) => {
        const detail = redact(formatDbError(err), [this.spec.connection.dsn]);
        log.knex.warn(`${this.sourceName}: closing cursor failed: ${detail}`);
      });
    }
  }

  /** SQLite query without a key: one statement, split into windows. */
  private async *readStatement(dataset: SqlDataset): AsyncGenerator<ExtractedRecord[], void, undefined> {
    const { batchSize } = this.spec.connection;
    const builder = this.client.queryBuilder().select('*').from(this.from(dataset));
    const rows = toRecords(this.sourceName, await this.attempt(builder, dataset, 0));

    for (let start = 0; start < rows.length; start += batchSize) {
      yield rows.slice(start, start + batchSize);
    }
  }

  private readDataset(dataset: SqlDataset): AsyncGenerator<ExtractedRecord[], void, undefined> {
    if (dataset.primaryKey) return this.readKeyset(dataset, dataset.primaryKey, false);
    if (!isSqlite(this.spec.connection)) return this.readCursor(dataset);
    if (dataset.kind === 'table') return this.readKeyset(dataset, 'rowid', true);
    return this.readStatement(dataset);
  }

  protected async *readBatches(): AsyncGenerator<Batch, void, undefined> {
    for (const dataset of this.spec.connection.datasets) {
      const name = datasetName(dataset);
      let sequence = 0;

      for await (const records of this.readDataset(dataset)) {
        sequence++;
        log.debug(`${this.sourceName}: read ${records.length} rows from ${name} (window ${sequence})`);
        yield { dataset: name, sequence, records };
      }
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.client.destroy();
  }
}

/**
 * SQL desktop source connector.
 * Connects through knex with the configured driver and DSN.
 */
class SqlDesktopConnector implements SourceConnector<SqlDesktopSpec> {
  readonly kind = 'sql_desktop';

  async open(spec: SqlDesktopSpec): Promise<ConnectorHandle> {
    const client = createClient(spec.connection);

    try {
      await client.raw('select 1');
    } catch (err) {
      await client.destroy();
      const detail = redact(formatDbError(err), [spec.connection.dsn]);
      throw new ConnectionError(spec.name, `cannot connect via ${spec.connection.driver}: ${detail}`, { cause: err });
    }

    log.debug(`${spec.name}: connected via ${spec.connection.driver}`);
    return new SqlDesktopHandle(spec, client);
  }
}

export const sqlDesktopConnector = (): SourceConnector<SqlDesktopSpec> => new SqlDesktopConnector();
