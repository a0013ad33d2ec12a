#!/usr/bin/env node
import { once } from 'events';
import fs, { promises as fsPromises, type WriteStream } from 'fs';
import path from 'path';
import type { Writable } from 'stream';
import { finished } from 'stream/promises';

import dotenv from 'dotenv';
import yargs, { type CommandModule } from 'yargs';
import { hideBin } from 'yargs/helpers';

import { WriteError, type Chunk, type ChunkMetadata, type SourceType } from '@logsweep/core';
import { BoundedChannel, CircleCiSource, type ClientFactory, type ScanReport } from '@logsweep/engine';

import { resolveScanConfig, type ResolvedScanConfig, type ScanCliOptions } from './config';
import { createLogger, type Logger } from './logging';
import { formatVersion } from './version';

const exitCodes = {
  success: 0,
  scanErrors: 2,
  error: 3,
} as const;

export interface ChunkRecord {
  sourceType: SourceType;
  sourceName: string;
  sourceId: number;
  jobId: number;
  verify: boolean;
  metadata: ChunkMetadata;
  data: string;
}

export const toChunkRecord = (chunk: Chunk): ChunkRecord => ({
  sourceType: chunk.sourceType,
  sourceName: chunk.sourceName,
  sourceId: chunk.sourceId,
  jobId: chunk.jobId,
  verify: chunk.verify,
  metadata: chunk.sourceMetadata,
  data: chunk.data.toString('utf8'),
});

/** Writes one JSON line per chunk, waiting on `drain` when the stream pushes back. */
export const writeChunks = async (chunks: AsyncIterable<Chunk>, stream: Writable): Promise<number> => {
  let written = 0;
  for await (const chunk of chunks) {
    const ready = stream.write(`${JSON.stringify(toChunkRecord(chunk))}\n`);
    written += 1;
    if (!ready) {
      await once(stream, 'drain');
    }
  }
  return written;
};

export interface RunScanOptions {
  signal?: AbortSignal;
  stdout?: Writable;
  createClient?: ClientFactory;
  failOnErrors?: boolean;
}

export interface RunScanResult {
  exitCode: number;
  report: ScanReport;
  written: number;
}

const openOutput = async (output: string): Promise<WriteStream> => {
  const outputPath = path.resolve(output);
  await fsPromises.mkdir(path.dirname(outputPath), { recursive: true });
  return fs.createWriteStream(outputPath, { encoding: 'utf8' });
};

export const runScan = async (
  config: ResolvedScanConfig,
  logger: Logger,
  options: RunScanOptions = {},
): Promise<RunScanResult> => {
  const source = new CircleCiSource({ logger, createClient: options.createClient });
  source.init(config.settings);

  const channel = new BoundedChannel<Chunk>(config.buffer);
  const file = config.output ? await openOutput(config.output) : undefined;
  const stream = file ?? options.stdout ?? process.stdout;

  let writeFailure: unknown;
  const stopOnWriteFailure = (error: unknown): void => {
    writeFailure ??= error;
    channel.close();
  };
  file?.on('error', stopOnWriteFailure);

  let written = 0;
  const writing = writeChunks(channel, stream).then((count) => {
    written = count;
  }, stopOnWriteFailure);

  logger.info(
    { source: config.settings.name, concurrency: config.settings.concurrency, output: config.output ?? 'stdout' },
    'Starting CircleCI scan.',
  );

  let report: ScanReport;
  try {
    report = await source.run(channel, { signal: options.signal });
  } finally {
    channel.close();
    await writing;
    if (file && !file.destroyed) {
      file.end();
      await finished(file);
    }
  }

  if (writeFailure !== undefined) {
    const reason = writeFailure instanceof Error ? writeFailure.message : String(writeFailure);
    throw new WriteError(`Unable to write scan output: ${reason}`, { cause: writeFailure });
  }

  const { errors, ...summary } = report;
  logger.info({ ...summary, written }, 'CircleCI scan finished.');
  if (errors.length > 0) {
    logger.warn({ errors: errors.map((failure) => failure.toJSON()) }, `${errors.length} project(s) could not be scanned.`);
  }

  const exitCode = options.failOnErrors && report.errorCount > 0 ? exitCodes.scanErrors : exitCodes.success;
  return { exitCode, report, written };
};

interface GlobalArguments {
  verbose?: boolean;
}

interface CircleCiCommandOptions extends GlobalArguments {
  config?: string;
  token?: string;
  name?: string;
  'job-id'?: number;
  'source-id'?: number;
  concurrency?: number;
  verify?: boolean;
  'base-url'?: string;
  'dashboard-url'?: string;
  'max-log-bytes'?: number;
  output?: string;
  buffer?: number;
  'fail-on-errors': boolean;
}

let sharedLogger: Logger | undefined;

const getLogger = (argv: yargs.ArgumentsCamelCase<GlobalArguments>): Logger => {
  if (!sharedLogger) {
    sharedLogger = createLogger({ verbose: Boolean(argv.verbose) });
  }
  return sharedLogger;
};

const logCliError = (logger: Logger, error: unknown, context: Record<string, unknown> = {}): void => {
  if (error instanceof Error) {
    logger.error({ ...context, err: error }, error.message);
    return;
  }

  logger.error({ ...context, error: { message: String(error) } }, 'An unexpected error occurred.');
};

export const circleciCommand: CommandModule<GlobalArguments, CircleCiCommandOptions> = {
  command: 'circleci',
  describe: 'Scans every project of a CircleCI account and writes the action logs as NDJSON.',
  builder: (yargsCommand) =>
    yargsCommand
      .option('config', {
        alias: 'c',
        describe: 'YAML file with the scan settings.',
        type: 'string',
      })
      .option('token', {
        describe: 'CircleCI API token (defaults to $CIRCLECI_TOKEN).',
        type: 'string',
      })
      .option('name', {
        describe: 'Source name stamped on every chunk.',
        type: 'string',
      })
      .option('job-id', {
        describe: 'Job identifier stamped on every chunk.',
        type: 'number',
      })
      .option('source-id', {
        describe: 'Source identifier stamped on every chunk.',
        type: 'number',
      })
      .option('concurrency', {
        describe: 'Projects scanned at the same time (default 8).',
        type: 'number',
      })
      .option('verify', {
        describe: 'Mark chunks for verification downstream.',
        type: 'boolean',
      })
      .option('base-url', {
        describe: 'CircleCI v1.1 API base URL.',
        type: 'string',
      })
      .option('dashboard-url', {
        describe: 'CircleCI dashboard host used in chunk links.',
        type: 'string',
      })
      .option('max-log-bytes', {
        describe: 'Largest action log fetched, in bytes; a larger log fails its project.',
        type: 'number',
      })
      .option('output', {
        alias: 'o',
        describe: 'File receiving the NDJSON chunks (default stdout).',
        type: 'string',
      })
      .option('buffer', {
        describe: 'Chunks held in memory before the scan waits for the writer (default 64).',
        type: 'number',
      })
      .option('fail-on-errors', {
        describe: 'Exit with code 2 when any project could not be scanned.',
        type: 'boolean',
        default: false,
      }),
  handler: async (argv) => {
    const logger = getLogger(argv);
    const cliOptions: ScanCliOptions = {
      config: argv.config,
      token: argv.token,
      name: argv.name,
      jobId: argv.jobId,
      sourceId: argv.sourceId,
      concurrency: argv.concurrency,
      verify: argv.verify,
      baseUrl: argv.baseUrl,
      dashboardUrl: argv.dashboardUrl,
      maxLogBytes: argv.maxLogBytes,
      output: argv.output,
      buffer: argv.buffer,
    };
    const context = {
      command: 'circleci',
      ...(argv.config ? { config: path.resolve(argv.config) } : {}),
      ...(argv.output ? { output: path.resolve(argv.output) } : {}),
    };

    const controller = new AbortController();
    const onInterrupt = (): void => {
      logger.warn(context, 'Interrupted; cancelling the scan.');
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
      const config = await resolveScanConfig(cliOptions);
      const result = await runScan(config, logger, {
        signal: controller.signal,
        failOnErrors: argv.failOnErrors,
      });
      process.exitCode = result.exitCode;
    } catch (error) {
      logCliError(logger, error, context);
      process.exitCode = exitCodes.error;
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  },
};

if (require.main === module) {
  dotenv.config();

  const cli = yargs(hideBin(process.argv))
    .scriptName('logsweep')
    .usage('$0 <command> [options]')
    .option('verbose', {
      describe: 'Debug-level JSON logs on stderr.',
      type: 'boolean',
      global: true,
      default: false,
    })
    .version('version', 'Show version information.', formatVersion())
    .alias('version', ['v', 'V'])
    .command(circleciCommand)
    .demandCommand(1, 'Choose a command.')
    .strict()
    .help()
    .alias('help', 'h')
    .wrap(100);

  void cli.parseAsync();
}

export const __internal = {
  logCliError,
};

export { exitCodes };
