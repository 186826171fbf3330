#!/usr/bin/env node

/**
 * powermeter
 *
 * Drive a bench power meter from the command line, or serve the same
 * commands over TCP so a remote caller can type them instead.
 *
 * Usage:
 *   powermeter info                          # Dump every readable property
 *   powermeter get voltage-range             # Read one property
 *   powermeter set update-rate 0.5           # Change one property
 *   powermeter read U,I,P --limit 1:30       # Sample for 90 seconds
 *   powermeter integration reset             # Stops first if running
 *   powermeter listen --port 10024           # Serve commands over TCP
 *   powermeter --emulate info                # Talk to the built-in emulator
 */

import { loadConfig, ConfigOverrides } from './config';
import { MeterConfig } from './config-schema';
import { MeterError, Result, UsageError, errorMessage, exitCodeFor, resultOf, toResult } from './errors';
import { LogLevel, getRootLogger, initLogger } from './logger';
import { ConsoleSink, OutputSink } from './commands/output-sink';
import { COMMAND_SUMMARY, MeterRequest, parseRequest } from './commands/request-parser';
import { loadInstrumentProfile } from './registry/instrument-profile';
import { MeterRuntime, createRuntime } from './runtime';
import { RemoteSession } from './server/remote-session';

export interface CliArguments {
  configPath?: string;
  overrides: ConfigOverrides;
  command: string[];
  showHelp: boolean;
}

function printUsage(sink: OutputSink): void {
  sink.info('');
  sink.info('  powermeter - bench power meter control');
  sink.info('');
  sink.info('  Usage: powermeter [options] <command> [arguments]');
  sink.info('');
  sink.info('  Commands:');
  const width = Math.max(...COMMAND_SUMMARY.map(([usage]) => usage.length));
  for (const [usage, text] of COMMAND_SUMMARY) {
    sink.info(`    ${usage.padEnd(width)}  ${text}`);
  }
  sink.info('');
  sink.info('  Options:');
  sink.info('    --config, -c <path>    Path to config YAML file (default ./powermeter.yml)');
  sink.info('    --profile <path>       Instrument profile YAML (default: bundled instrument.yml)');
  sink.info('    --host <host>          Meter gateway host');
  sink.info('    --device-port <port>   Meter gateway TCP port');
  sink.info('    --timeout <ms>         Per-request reply timeout');
  sink.info('    --emulate, -e          Use the built-in meter emulator');
  sink.info('    --verbose, -v          Enable debug logging');
  sink.info('    --help, -h             Show this help');
  sink.info('');
}

function numberOption(flag: string, value: string | undefined): number {
  if (value === undefined || !/^-?\d+$/.test(value)) {
    throw new UsageError(`${flag} requires a whole number`);
  }
  return parseInt(value, 10);
}

function stringOption(flag: string, value: string | undefined): string {
  if (value === undefined || value === '') {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

/**
 * Split process arguments into global options and the command tokens.
 * Global options come before the command name; everything from the
 * command name on belongs to the shared request grammar.
 */
export function parseArgs(argv: readonly string[]): Result<CliArguments> {
  return resultOf(() => {
    const overrides: ConfigOverrides = {};
    let configPath: string | undefined;
    let showHelp = false;
    let i = 2;

    for (; i < argv.length; i++) {
      const arg = argv[i];
      if (!arg.startsWith('-')) break;
      switch (arg) {
        case '--config':
        case '-c':
          configPath = stringOption(arg, argv[++i]);
          break;
        case '--profile':
          overrides.profile = stringOption(arg, argv[++i]);
          break;
        case '--host':
          overrides.host = stringOption(arg, argv[++i]);
          break;
        case '--device-port':
          overrides.devicePort = numberOption(arg, argv[++i]);
          break;
        case '--timeout':
          overrides.timeoutMs = numberOption(arg, argv[++i]);
          break;
        case '--emulate':
        case '-e':
          overrides.emulate = true;
          break;
        case '--verbose':
        case '-v':
          overrides.verbose = true;
          break;
        case '--help':
        case '-h':
          showHelp = true;
          break;
        default:
          throw new UsageError(`Unknown option "${arg}"`);
      }
    }

    return { configPath, overrides, command: argv.slice(i), showHelp };
  });
}

function logLevelFor(config: MeterConfig): LogLevel {
  return config.logging.level ?? (config.logging.verbose ? 'debug' : 'info');
}

/** Serve remote commands until the service stops or the operator interrupts */
async function runListen(runtime: MeterRuntime, config: MeterConfig, port: number | undefined): Promise<void> {
  const session = new RemoteSession({
    handler: runtime.dispatcher,
    grammar: runtime.grammar,
    host: config.listen.host,
    port: port ?? config.listen.port,
  });

  const onSigint = (): void => {
    getRootLogger().info('Interrupted, shutting down');
    void session.close();
  };
  process.on('SIGINT', onSigint);
  try {
    await session.listen();
    await session.serve();
  } finally {
    process.off('SIGINT', onSigint);
  }
}

/** Run one request with the console as output; SIGINT interrupts it */
async function runOnce(runtime: MeterRuntime, request: MeterRequest, sink: OutputSink): Promise<number> {
  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) process.exit(130);
    controller.abort();
  };
  process.on('SIGINT', onSigint);
  try {
    const result = await runtime.dispatcher.dispatch(request, sink, controller.signal);
    if (!result.ok) {
      sink.error(result.error.message);
      return exitCodeFor(result.error);
    }
    return controller.signal.aborted ? 130 : 0;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

function report(sink: OutputSink, error: MeterError): number {
  sink.error(error.message);
  if (error.kind === 'usage') sink.error('Run "powermeter help" for the command list');
  return exitCodeFor(error);
}

export async function main(argv: readonly string[], sink: OutputSink = new ConsoleSink()): Promise<number> {
  const args = parseArgs(argv);
  if (!args.ok) return report(sink, args.error);

  if (args.value.showHelp || args.value.command.length === 0) {
    printUsage(sink);
    return args.value.showHelp ? 0 : 2;
  }

  const setup = resultOf(() => {
    const config = loadConfig(args.value.configPath, args.value.overrides);
    initLogger({ level: logLevelFor(config), pretty: config.logging.pretty ?? process.stderr.isTTY });
    const profile = loadInstrumentProfile(config.profile);
    return { config, runtime: createRuntime(config, profile) };
  });
  if (!setup.ok) return report(sink, setup.error);
  const { config, runtime } = setup.value;

  const request = parseRequest(args.value.command, runtime.grammar);
  if (!request.ok) return report(sink, request.error);

  try {
    if (request.value.command === 'listen') {
      const port = request.value.port;
      const served = await toResult(runListen(runtime, config, port));
      return served.ok ? 0 : report(sink, served.error);
    }
    return await runOnce(runtime, request.value, sink);
  } finally {
    await runtime.transport.close();
  }
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      getRootLogger().fatal({ err }, `Unexpected failure: ${errorMessage(err)}`);
      process.exitCode = 1;
    },
  );
}
