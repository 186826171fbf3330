/**
 * Instrument profile loader
 *
 * Reads instrument.yml, validates it with zod and freezes the result.
 * The default profile ships at the package root.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors';
import { formatZodError } from '../config-schema';
import { InstrumentProfile } from './types';

export const DEFAULT_PROFILE_PATH = path.join(__dirname, '..', '..', 'instrument.yml');

const commandSchema = z.string().trim().min(1);

const propertySchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9-]*$/, 'Property names are lower-case words joined by hyphens'),
  get: commandSchema,
  set: commandSchema.optional(),
  help: z.string().default(''),
});

const dataItemSchema = z.object({
  id: z.string().regex(/^[A-Za-z][A-Za-z0-9]*$/, 'Item ids are alphanumeric'),
  description: z.string().default(''),
});

export const profileSchema = z.object({
  model: z.string().default('power meter'),
  properties: z.array(propertySchema).min(1),
  dataItems: z.array(dataItemSchema).min(1),
  readout: z.object({
    itemCount: commandSchema,
    itemPrefix: commandSchema,
    waitUpdate: commandSchema,
    updatePeriod: commandSchema,
    values: commandSchema,
    maxItems: z.number().int().min(1),
  }),
  integration: z.object({
    start: commandSchema,
    stop: commandSchema,
    reset: commandSchema,
    state: commandSchema,
    runningStates: z.array(z.string().min(1)).min(1),
  }),
  actions: z.object({
    calibrate: commandSchema,
    factoryReset: commandSchema,
  }),
  smoothing: z.object({
    property: z.string(),
    on: z.string().min(1),
    off: z.string().min(1),
  }),
}).superRefine((profile, ctx) => {
  const names = profile.properties.map((p) => p.name.toLowerCase());
  const repeated = names.filter((name, i) => names.indexOf(name) !== i);
  if (repeated.length > 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['properties'],
      message: `Duplicate property name: ${Array.from(new Set(repeated)).join(', ')}`,
    });
  }
  const ids = profile.dataItems.map((item) => item.id.toUpperCase());
  if (new Set(ids).size !== ids.length) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dataItems'], message: 'Duplicate data item id' });
  }
  const smoothing = profile.properties.find((p) => p.name === profile.smoothing.property);
  if (!smoothing || smoothing.set === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['smoothing', 'property'],
      message: `"${profile.smoothing.property}" must name a settable property`,
    });
  }
});

export type ProfileInput = z.input<typeof profileSchema>;

/** Validate an already-parsed profile document */
export function buildProfile(doc: unknown): InstrumentProfile {
  const parsed = profileSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ConfigError(`Invalid instrument profile:\n${formatZodError(parsed.error)}`);
  }
  const p = parsed.data;
  return Object.freeze({
    model: p.model,
    properties: p.properties.map((prop) => ({
      name: prop.name,
      getCommand: prop.get,
      setCommand: prop.set,
      helpText: prop.help,
    })),
    dataItems: p.dataItems.map((item) => ({ id: item.id.toUpperCase(), description: item.description })),
    readout: { ...p.readout },
    integration: {
      ...p.integration,
      runningStates: p.integration.runningStates.map((s) => s.toUpperCase()),
    },
    actions: { ...p.actions },
    smoothing: { ...p.smoothing },
  });
}

export function loadInstrumentProfile(filePath: string = DEFAULT_PROFILE_PATH): InstrumentProfile {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read instrument profile ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  let doc: unknown;
  try {
    doc = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`Instrument profile ${filePath} is not valid YAML: ${errorMessage(err)}`, { cause: err });
  }
  return buildProfile(doc);
}
