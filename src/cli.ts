#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { loadConfig } from './config/load';
import { createSink, listSourceTypes } from './dialects';
import { ConfigError, errorMessage } from './engine/errors';
import { log, setVerbose } from './engine/logger';
import { exitCodeFor, formatResult } from './engine/report';
import { run } from './engine/runner';
import { selectAll, selectNamed } from './engine/types';

import 'dotenv/config';

const DEFAULT_CONFIG = 'config.json';

type CliArgs = {
  command: string;
  configPath: string;
  source?: string;
  verbose: boolean;
  dryRun: boolean;
  help: boolean;
};

const parseCliArgs = (argv: string[]): CliArgs => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      source: { type: 'string', short: 's' },
      verbose: { type: 'boolean', short: 'v', default: false },
      'dry-run': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  return {
    command: positionals[0] ?? 'integrate',
    configPath: values.config ?? process.env.BUCKETSYNC_CONFIG ?? DEFAULT_CONFIG,
    source: values.source,
    verbose: values.verbose === true,
    dryRun: values['dry-run'] === true,
    help: values.help === true,
  };
};

const integrateCommand = async (args: CliArgs): Promise<number> => {
  const config = loadConfig(args.configPath);
  const selector = args.source ? selectNamed(args.source) : selectAll();
  const sink = createSink(config.storage, { dryRun: args.dryRun });

  const abortController = new AbortController();

  const onSignal = () => {
    if (abortController.signal.aborted) return;
    abortController.abort();
    console.info('\nGraceful shutdown requested, closing the current source...');
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const results = await run(config, selector, { sink, signal: abortController.signal, dryRun: args.dryRun });
    for (const result of results) {
      console.info(formatResult(result, args.verbose));
    }
    const code = exitCodeFor(results);
    if (code === 0) {
      log.success(`All ${results.length} source(s) synced`);
    }
    return code;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await sink.close?.();
  }
};

const sourcesCommand = (args: CliArgs): number => {
  const config = loadConfig(args.configPath);
  if (config.sources.length === 0) {
    console.info('No sources configured.');
    return 0;
  }
  for (const spec of config.sources) {
    console.info(`${spec.name}  (${spec.sourceType})`);
  }
  return 0;
};

const printUsage = (): void => {
  console.info(`
Usage: bucketsync [command] [options]

Commands:
  integrate  Extract sources and write them to the storage bucket (default)
  sources    List the sources declared in the config file

Options:
  -c, --config <path>   Config file (default: $BUCKETSYNC_CONFIG or ./${DEFAULT_CONFIG})
  -s, --source <name>   Only sync the named source
  -v, --verbose         Show record counts, storage keys, errors and debug lines
  --dry-run             Extract and serialize, but only log what would be written
  -h, --help            Show this help

Source types: ${listSourceTypes().join(', ')}

Environment:
  BUCKETSYNC_CONFIG     Default config file path
`);
};

const main = async (argv: string[]): Promise<number> => {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    log.error(errorMessage(err));
    printUsage();
    return 1;
  }

  setVerbose(args.verbose);

  if (args.help) {
    printUsage();
    return 0;
  }

  try {
    switch (args.command) {
      case 'integrate':
        return await integrateCommand(args);
      case 'sources':
        return sourcesCommand(args);
      default:
        log.error(`Unknown command "${args.command}"`);
        printUsage();
        return 1;
    }
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error(err.message);
      return 1;
    }
    throw err;
  }
};

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
