import fs from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';
import { ConfigError, errorMessage } from '../engine/errors';
import { Secret } from '../engine/secret';
import { ConfigSchema, StorageCredentialsFileSchema, formatIssues, type StorageCredentials } from './schema';
import type { Config, SourceSpec } from './types';

const readJson = (filepath: string, label: string): unknown => {
  if (!fs.existsSync(filepath)) {
    throw new ConfigError(`${label} not found: ${filepath}`);
  }

  const raw = fs.readFileSync(filepath, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${label} is not valid JSON (${filepath}): ${errorMessage(err)}`);
  }
};

const parseWith = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid ${label}: ${formatIssues(result.error)}`);
  }
  return result.data;
};

/** Parse an already-decoded config object. */
export const parseConfig = (value: unknown): Config => parseWith(ConfigSchema, value, 'config');

// SQLite DSNs that are not file paths
const isSpecialSqliteDsn = (dsn: string): boolean => dsn === ':memory:' || dsn.startsWith('file:');

const resolveSqlitePath = (spec: SourceSpec, baseDir: string): SourceSpec => {
  if (spec.sourceType !== 'sql_desktop' || spec.connection.driver !== 'better-sqlite3') return spec;

  const dsn = spec.connection.dsn.reveal();
  if (isSpecialSqliteDsn(dsn) || path.isAbsolute(dsn)) return spec;

  return { ...spec, connection: { ...spec.connection, dsn: new Secret(path.resolve(baseDir, dsn)) } };
};

/**
 * Load and validate the JSON config file. A relative `credentials_path`
 * and relative SQLite file DSNs are resolved against the config file's directory.
 */
export const loadConfig = (configPath: string): Config => {
  const filepath = path.resolve(configPath);
  const baseDir = path.dirname(filepath);
  const config = parseConfig(readJson(filepath, 'Config file'));

  return {
    ...config,
    storage: {
      ...config.storage,
      credentialsPath: path.resolve(baseDir, config.storage.credentialsPath),
    },
    sources: config.sources.map((spec) => resolveSqlitePath(spec, baseDir)),
  };
};

export const loadStorageCredentials = (credentialsPath: string): StorageCredentials =>
  parseWith(StorageCredentialsFileSchema, readJson(credentialsPath, 'Storage credentials file'), 'storage credentials');
