/**
 * Configuration loader
 *
 * Reads an optional YAML config file (powermeter.yml in the working
 * directory, or an explicit --config path), applies command-line
 * overrides and validates the merged result.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ConfigError, errorMessage } from './errors';
import { MeterConfig, MeterConfigInput, formatZodError, meterConfigSchema, portSchema } from './config-schema';

export const DEFAULT_CONFIG_FILE = 'powermeter.yml';

/** Overrides collected from global command-line options */
export interface ConfigOverrides {
  host?: string;
  devicePort?: number;
  timeoutMs?: number;
  emulate?: boolean;
  verbose?: boolean;
  profile?: string;
}

export function validateConfig(data: unknown): MeterConfig {
  const parsed = meterConfigSchema.safeParse(data ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration:\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Load config from YAML and merge overrides.
 * A missing default file means "all defaults"; a missing explicit file is an error.
 */
export function loadConfig(configPath?: string, overrides: ConfigOverrides = {}): MeterConfig {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  let doc: MeterConfigInput = {};
  if (fs.existsSync(resolvedPath)) {
    let raw: string;
    try {
      raw = fs.readFileSync(resolvedPath, 'utf-8');
    } catch (err) {
      throw new ConfigError(`Cannot read config ${resolvedPath}: ${errorMessage(err)}`, { cause: err });
    }
    const parsed: unknown = parseDocument(raw, resolvedPath);
    doc = validateConfig(parsed);
    if (doc.profile && !path.isAbsolute(doc.profile)) {
      doc.profile = path.resolve(path.dirname(resolvedPath), doc.profile);
    }
  } else if (configPath) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  return validateConfig(applyOverrides(doc, overrides));
}

function parseDocument(raw: string, filePath: string): unknown {
  try {
    return parse(raw);
  } catch (err) {
    throw new ConfigError(`Config ${filePath} is not valid YAML: ${errorMessage(err)}`, { cause: err });
  }
}

export function applyOverrides(doc: MeterConfigInput, overrides: ConfigOverrides): MeterConfigInput {
  const device = { ...doc.device };
  if (overrides.host !== undefined) device.host = overrides.host;
  if (overrides.devicePort !== undefined) device.port = overrides.devicePort;
  if (overrides.timeoutMs !== undefined) device.timeoutMs = overrides.timeoutMs;
  if (overrides.emulate) device.emulate = true;

  const logging = { ...doc.logging };
  if (overrides.verbose) logging.verbose = true;

  return {
    ...doc,
    device,
    logging,
    profile: overrides.profile !== undefined ? path.resolve(overrides.profile) : doc.profile,
  };
}

/** Validate a listening port before any socket is opened */
export function validatePort(port: number): number {
  const parsed = portSchema.safeParse(port);
  if (!parsed.success) {
    throw new ConfigError(`Invalid port ${port}: must be an integer between 1 and 65535`);
  }
  return parsed.data;
}
