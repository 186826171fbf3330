/**
 * Request grammar
 *
 * The one definition of the command language, shared by the local entry
 * point (process arguments) and the remote session (one text line per
 * request, tokenized first):
 *
 *   info
 *   read <items> [--limit|-l L] [--until-integration-ends|-i]
 *   get <property>
 *   set <property> [value|?]
 *   integration wait|start|stop|reset|state
 *   smoothing on|off|?
 *   calibrate
 *   factory-reset
 *   listen [--port|-p P]
 *   help
 */

import { validatePort } from '../config';
import { Result, UsageError, fail, ok, resultOf } from '../errors';
import { ReadPolicy } from '../device/read-loop';
import { DataItem, InstrumentProfile } from '../registry/types';
import { HELP_VALUE } from '../device/command-executor';

export const INTEGRATION_ACTIONS = ['wait', 'start', 'stop', 'reset', 'state'] as const;
export type IntegrationAction = typeof INTEGRATION_ACTIONS[number];

export const SMOOTHING_MODES = ['on', 'off', HELP_VALUE] as const;
export type SmoothingMode = typeof SMOOTHING_MODES[number];

export type MeterRequest =
  | { command: 'info' }
  | { command: 'read'; items: string[]; policy: ReadPolicy }
  | { command: 'get'; property: string }
  | { command: 'set'; property: string; value: string }
  | { command: 'integration'; action: IntegrationAction }
  | { command: 'smoothing'; mode: SmoothingMode }
  | { command: 'calibrate' }
  | { command: 'factory-reset' }
  | { command: 'listen'; port?: number }
  | { command: 'help' };

export const COMMAND_SUMMARY: ReadonlyArray<readonly [string, string]> = [
  ['info', 'Show every readable property'],
  ['read <items> [--limit L] [--until-integration-ends]', 'Sample data items (L: count, -1, M:S or H:M:S)'],
  ['get <property>', 'Show one property'],
  ['set <property> [value|?]', 'Change a property, or show its help with ?'],
  ['integration wait|start|stop|reset|state', 'Control the integrator'],
  ['smoothing on|off|?', 'Toggle signal averaging'],
  ['calibrate', 'Run zero-level calibration'],
  ['factory-reset', 'Restore factory settings'],
  ['listen [--port P]', 'Serve these commands over TCP (default port 10024)'],
  ['help', 'Show this summary'],
];

/** What the grammar needs to know about the instrument */
export interface RequestGrammar {
  readonly dataItems: readonly DataItem[];
  readonly maxItems: number;
}

export function grammarFor(profile: InstrumentProfile): RequestGrammar {
  return { dataItems: profile.dataItems, maxItems: profile.readout.maxItems };
}

/**
 * Split a request line into tokens on whitespace. Single or double quotes
 * group words; a backslash escapes the next character outside single quotes.
 */
export function tokenize(line: string): Result<string[]> {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === '\\' && quote === '"' && i + 1 < line.length) {
        current += line[++i];
      } else {
        current += ch;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (ch === '\\' && i + 1 < line.length) {
      current += line[++i];
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) tokens.push(current);
      current = '';
      inToken = false;
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quote) return fail(new UsageError(`Unterminated ${quote} quote`));
  if (inToken) tokens.push(current);
  return ok(tokens);
}

/**
 * Resolve a read limit:
 *   -1            unbounded
 *   N             N samples
 *   M:S, H:M:S    duration; rightmost field is seconds, then minutes, then hours
 */
export function parseReadLimit(text: string): Result<ReadPolicy> {
  const value = text.trim();
  if (value === '-1') {
    return ok({ kind: 'count', limit: 'forever' });
  }
  if (/^\d+$/.test(value)) {
    return ok({ kind: 'count', limit: parseInt(value, 10) });
  }
  if (/^\d+(:\d+){1,2}$/.test(value)) {
    const fields = value.split(':').map((f) => parseInt(f, 10)).reverse();
    const multipliers = [1, 60, 3600];
    const seconds = fields.reduce((total, field, i) => total + field * multipliers[i], 0);
    return ok({ kind: 'duration', seconds });
  }
  return fail(new UsageError(
    `Invalid limit "${text}": use a sample count, -1 for no limit, or a duration as M:S or H:M:S`,
  ));
}

/** Comma-separated item ids, case-insensitive, at most grammar.maxItems of them */
export function parseItemList(text: string, grammar: RequestGrammar): Result<string[]> {
  const known = new Set(grammar.dataItems.map((item) => item.id.toUpperCase()));
  const items = text.split(',').map((part) => part.trim().toUpperCase());

  if (items.some((item) => item === '')) {
    return fail(new UsageError(`Invalid item list "${text}": empty entry`));
  }
  const unknown = items.filter((item) => !known.has(item));
  if (unknown.length > 0) {
    return fail(new UsageError(
      `Unknown data item(s): ${unknown.join(', ')}. Available: ${Array.from(known).join(', ')}`,
    ));
  }
  if (items.length > grammar.maxItems) {
    return fail(new UsageError(`Too many data items (${items.length}); the meter reads at most ${grammar.maxItems}`));
  }
  return ok(items);
}

// --- Request parsing ---

/** Pull `--name value`, `-n value` or `--name=value` out of args */
interface OptionSpec {
  long: string;
  short: string;
  takesValue: boolean;
}

interface ParsedOptions {
  positionals: string[];
  values: Map<string, string | true>;
}

function parseOptions(command: string, args: string[], specs: OptionSpec[]): ParsedOptions {
  const positionals: string[] = [];
  const values = new Map<string, string | true>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const [flag, inline] = arg.startsWith('--') && arg.includes('=')
      ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)]
      : [arg, undefined];
    const spec = specs.find((s) => flag === `--${s.long}` || flag === `-${s.short}`);

    if (!spec) {
      if (arg.startsWith('-') && arg.length > 1) {
        throw new UsageError(`Unknown option "${arg}" for ${command}`);
      }
      positionals.push(arg);
      continue;
    }
    if (values.has(spec.long)) {
      throw new UsageError(`Option --${spec.long} given more than once`);
    }
    if (!spec.takesValue) {
      if (inline !== undefined) throw new UsageError(`Option --${spec.long} takes no value`);
      values.set(spec.long, true);
      continue;
    }
    const value = inline ?? args[++i];
    if (value === undefined || value === '') {
      throw new UsageError(`Option --${spec.long} requires a value`);
    }
    values.set(spec.long, value);
  }

  return { positionals, values };
}

function expectArgs(positionals: readonly string[], min: number, max: number, usage: string): void {
  if (positionals.length < min || positionals.length > max) {
    throw new UsageError(`Usage: ${usage}`);
  }
}

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

function parseRead(args: string[], grammar: RequestGrammar): MeterRequest {
  const usage = 'read <items> [--limit L] [--until-integration-ends]';
  const { positionals, values } = parseOptions('read', args, [
    { long: 'limit', short: 'l', takesValue: true },
    { long: 'until-integration-ends', short: 'i', takesValue: false },
  ]);
  expectArgs(positionals, 1, 1, usage);

  const limit = values.get('limit');
  const untilIntegration = values.has('until-integration-ends');
  if (untilIntegration && limit !== undefined) {
    throw new UsageError('--limit and --until-integration-ends cannot be combined');
  }

  const items = unwrap(parseItemList(positionals[0], grammar));
  let policy: ReadPolicy = { kind: 'count', limit: 'forever' };
  if (untilIntegration) {
    policy = { kind: 'until-integration-ends' };
  } else if (typeof limit === 'string') {
    policy = unwrap(parseReadLimit(limit));
  }
  return { command: 'read', items, policy };
}

function parseListen(args: string[]): MeterRequest {
  const { positionals, values } = parseOptions('listen', args, [
    { long: 'port', short: 'p', takesValue: true },
  ]);
  expectArgs(positionals, 0, 0, 'listen [--port P]');

  const port = values.get('port');
  if (typeof port !== 'string') return { command: 'listen' };
  if (!/^-?\d+$/.test(port)) {
    throw new UsageError(`Invalid port "${port}": expected a number`);
  }
  return { command: 'listen', port: validatePort(parseInt(port, 10)) };
}

function oneOf<T extends string>(value: string, allowed: readonly T[], usage: string): T {
  const match = allowed.find((candidate) => candidate === value.toLowerCase());
  if (match === undefined) throw new UsageError(`Usage: ${usage}`);
  return match;
}

function parse(tokens: readonly string[], grammar: RequestGrammar): MeterRequest {
  if (tokens.length === 0) {
    throw new UsageError('No command given; try "help"');
  }
  const [name, ...args] = tokens;

  switch (name.toLowerCase()) {
    case 'info':
      expectArgs(args, 0, 0, 'info');
      return { command: 'info' };
    case 'calibrate':
      expectArgs(args, 0, 0, 'calibrate');
      return { command: 'calibrate' };
    case 'factory-reset':
      expectArgs(args, 0, 0, 'factory-reset');
      return { command: 'factory-reset' };
    case 'help':
      return { command: 'help' };
    case 'read':
      return parseRead(args, grammar);
    case 'get':
      expectArgs(args, 1, 1, 'get <property>');
      return { command: 'get', property: args[0] };
    case 'set':
      expectArgs(args, 1, 2, 'set <property> [value|?]');
      return { command: 'set', property: args[0], value: args[1] ?? HELP_VALUE };
    case 'integration':
      expectArgs(args, 1, 1, 'integration wait|start|stop|reset|state');
      return {
        command: 'integration',
        action: oneOf(args[0], INTEGRATION_ACTIONS, 'integration wait|start|stop|reset|state'),
      };
    case 'smoothing':
      expectArgs(args, 1, 1, 'smoothing on|off|?');
      return { command: 'smoothing', mode: oneOf(args[0], SMOOTHING_MODES, 'smoothing on|off|?') };
    case 'listen':
      return parseListen(args);
    default:
      throw new UsageError(`Unknown command "${name}"; try "help"`);
  }
}

/**
 * Turn a token sequence into a structured request.
 * Usage and configuration problems come back as failures.
 */
export function parseRequest(tokens: readonly string[], grammar: RequestGrammar): Result<MeterRequest> {
  return resultOf(() => parse(tokens, grammar));
}
