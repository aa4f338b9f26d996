const pad = (n: number, len = 2): string => String(n).padStart(len, '0');

/** UTC run stamp, e.g. `2024-03-09_14-05-00`. Shared by every key of one run. */
export const formatRunStamp = (date: Date): string =>
  `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
  `_${pad(date.getUTCHours())}-${pad(date.getUTCMinutes())}-${pad(date.getUTCSeconds())}`;

/** Prefix every object of one source in one run lives under. */
export const sourcePrefix = (client: string, sourceName: string, runStamp: string): string =>
  `${client}/${sourceName}/${runStamp}`;

/** `{client}/{source}/{runStamp}/{dataset}/part-00001.jsonl` */
export const batchKey = (prefix: string, dataset: string, sequence: number): string =>
  `${prefix}/${dataset}/part-${pad(sequence, 5)}.jsonl`;
