import type { SyncResult, SyncStatus } from './types';

type AnsiColor = {
  reset: string;
  dim: string;
  bold: string;
  red: string;
  green: string;
  yellow: string;
  blue: string;
  cyan: string;
  magenta: string;
};

const COLORS: Readonly<AnsiColor> = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

const SOURCE_COLORS = [COLORS.blue, COLORS.cyan, COLORS.magenta, COLORS.green, COLORS.yellow];

const STATUS_COLORS: Record<SyncStatus, string> = {
  success: COLORS.green,
  partial: COLORS.yellow,
  failed: COLORS.red,
  cancelled: COLORS.magenta,
};

let verbose = false;

export const setVerbose = (enabled: boolean): void => {
  verbose = enabled;
};

const pad = (n: number, len = 2): string => String(n).padStart(len, '0');

const timestamp = (): string => {
  const d = new Date();
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
};

const formatNumber = (n: number): string => n.toLocaleString('en-US');

const sourceTag = (index: number, name: string): string => {
  const color = SOURCE_COLORS[index % SOURCE_COLORS.length];
  return `${color}${name}${COLORS.reset}`;
};

const formatElapsed = (elapsed: number): string => {
  if (elapsed < 60_000) {
    return `${(elapsed / 1000).toFixed(1)}s`;
  }

  const minutes = Math.floor(elapsed / 60_000);
  const seconds = Math.round((elapsed % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
};

export const formatStatus = (status: SyncStatus): string =>
  `${STATUS_COLORS[status]}${status.toUpperCase()}${COLORS.reset}`;

export const log = {
  info: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${message}`);
  },

  success: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.green}${message}${COLORS.reset}`);
  },

  warn: (message: string) => {
    console.warn(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.yellow}WARN${COLORS.reset}  ${message}`);
  },

  error: (message: string) => {
    console.error(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.red}ERR${COLORS.reset}   ${message}`);
  },

  debug: (message: string) => {
    if (!verbose) return;
    console.debug(`${COLORS.dim}${timestamp()}  dbg   ${message}${COLORS.reset}`);
  },

  source: (index: number, name: string, message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${sourceTag(index, name)}  ${message}`);
  },

  sourceError: (index: number, name: string, errorType: string, detail: string) => {
    console.error(
      `${COLORS.dim}${timestamp()}${COLORS.reset}  ${sourceTag(index, name)}  ${COLORS.red}${errorType}${COLORS.reset}  ${detail}`
    );
  },

  storage: (action: string, key: string, count: number, elapsed: number) => {
    const tag = `${COLORS.dim}sink${COLORS.reset}`;
    const time = (() => {
      if (elapsed > 1000) {
        return `${COLORS.yellow}${elapsed}ms${COLORS.reset}`;
      }
      return `${COLORS.dim}${elapsed}ms${COLORS.reset}`;
    })();
    console.info(
      `${COLORS.dim}${timestamp()}${COLORS.reset}  ${tag}   ${action} ${COLORS.bold}${formatNumber(count)}${
        COLORS.reset
      } records → ${key}  ${time}`
    );
  },

  sync: {
    start: (config: { client: string; bucket: string; sourceCount: number; runStamp: string; dryRun: boolean }) => {
      const dryRun = config.dryRun ? `${COLORS.yellow}yes${COLORS.reset}` : 'no';
      const lines = [
        '',
        `${COLORS.bold}Sync started${COLORS.reset}`,
        `  client:   ${config.client}`,
        `  bucket:   ${config.bucket}`,
        `  sources:  ${config.sourceCount}`,
        `  run:      ${config.runStamp}`,
        `  dry run:  ${dryRun}`,
        '',
      ];
      console.info(lines.join('\n'));
    },

    summary: (results: readonly SyncResult[], elapsed: number) => {
      const count = (status: SyncStatus): number => results.filter((r) => r.status === status).length;
      const records = results.reduce((sum, r) => sum + r.recordsWritten, 0);
      const failed = count('failed');

      const lines = [
        '',
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        `  ${COLORS.bold}Sync finished${COLORS.reset}  ${COLORS.dim}(${formatElapsed(elapsed)})${COLORS.reset}`,
        '',
        `  records:   ${COLORS.bold}${formatNumber(records)}${COLORS.reset}`,
        `  success:   ${COLORS.green}${count('success')}${COLORS.reset}`,
        `  partial:   ${COLORS.yellow}${count('partial')}${COLORS.reset}`,
        `  failed:    ${failed > 0 ? COLORS.red : ''}${failed}${COLORS.reset}`,
        `  cancelled: ${count('cancelled')}`,
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        '',
      ];
      console.info(lines.join('\n'));
    },
  },

  knex: {
    warn: (message: string) => {
      log.warn(`[knex] ${message}`);
    },
    error: (message: string) => {
      log.error(`[knex] ${message}`);
    },
  },
};

interface PgError {
  severity?: string;
  code?: string;
  detail?: string;
  table?: string;
  hint?: string;
  message?: string;
}

const isPgError = (err: unknown): err is PgError =>
  err !== null && typeof err === 'object' && 'severity' in err && 'code' in err;

/** One-line driver error summary; pg errors keep their diagnostic fields. */
export const formatDbError = (err: unknown): string => {
  if (!isPgError(err)) {
    const msg = err instanceof Error ? err.message : String(err);
    return msg.split('\n')[0].slice(0, 200);
  }

  const fields: Array<[string, string | undefined]> = [
    ['message', err.message],
    ['code', err.code],
    ['severity', err.severity],
    ['detail', err.detail],
    ['table', err.table],
    ['hint', err.hint],
  ];

  return fields
    .filter(([, v]) => v)
    .map(([k, v]) => `${k}=${v}`)
    .join(' ');
};
