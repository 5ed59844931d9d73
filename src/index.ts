#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command, CommanderError } from 'commander';
import { loadConfig } from './config/loader.js';
import { debug, setDebugEnabled } from './debug.js';
import { buildReportRows } from './domain/disruptions.js';
import { UsageError, errorMessage, exitCodeFor } from './errors.js';
import { KubectlClient } from './kubernetes/client.js';
import { execFileRunner, type CommandRunner } from './kubernetes/runner.js';
import { writeCsvReport, writeTsv, type OutputStream } from './report/writers.js';

const VERSION = '0.1.0';

interface CliOptions {
  csv?: string;
  config?: string;
  context?: string;
  debug?: boolean;
}

export interface StatusStream {
  write(chunk: string): unknown;
}

export interface RunIo {
  stdout: OutputStream;
  stderr: StatusStream;
  runner: CommandRunner;
}

const defaultIo = (): RunIo => ({
  stdout: process.stdout,
  stderr: process.stderr,
  runner: execFileRunner,
});

const buildProgram = (): Command =>
  new Command()
    .name('pod-disruption-report')
    .description('Report every pod with its ReplicaSet, PriorityClass and matching PodDisruptionBudget')
    .version(VERSION)
    .option('--csv <path>', 'CSV output path (default: pod-disruptions.csv)')
    .option('-c, --config <path>', 'optional YAML or JSON config file')
    .option('--context <name>', 'kubeconfig context to query')
    .option('-d, --debug', 'enable debug logging')
    .allowExcessArguments(false)
    .showSuggestionAfterError(false)
    .exitOverride()
    .configureOutput({
      // Usage errors are printed once, by main.
      outputError: () => undefined,
    });

/** Parses argv; returns undefined when commander already handled --help or --version. */
const parseCli = (argv: string[]): CliOptions | undefined => {
  const program = buildProgram();
  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.exitCode === 0) {
        debug('cli exited early', { code: error.code });
        return undefined;
      }
      debug('cli usage error', { code: error.code, message: error.message });
      throw new UsageError(error.message.replace(/^error: /, ''), { cause: error });
    }
    throw error;
  }
  return program.opts<CliOptions>();
};

export const run = async (argv: string[], io: RunIo = defaultIo()): Promise<void> => {
  if (argv.includes('--debug') || argv.includes('-d')) {
    setDebugEnabled(true);
  }
  debug('run start', { argv });

  const opts = parseCli(argv);
  if (!opts) return;
  if (opts.debug) {
    setDebugEnabled(true);
  }
  debug('cli options parsed', opts);

  const config = await loadConfig(opts.config, { csvPath: opts.csv, context: opts.context });

  const client = new KubectlClient({ binary: config.kubectl, context: config.context, runner: io.runner });
  await client.ensureAvailable();

  const snapshot = await client.fetchSnapshot();
  const rows = buildReportRows(snapshot);

  const csvPath = await writeCsvReport(config.csvPath, rows);
  io.stderr.write(`Wrote CSV to: ${config.csvPath}\n`);
  await writeTsv(io.stdout, rows);
  debug('run end', { rows: rows.length, csvPath });
};

export const main = async (): Promise<void> => {
  debug('main start');
  try {
    await run(process.argv);
    debug('main end success');
  } catch (error) {
    const message = errorMessage(error);
    debug('main end failure', { message, error });
    console.error(`Error: ${message}`);
    process.exitCode = exitCodeFor(error);
  }
};

const isMain = (): boolean => {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
};

if (isMain()) {
  void main();
}
