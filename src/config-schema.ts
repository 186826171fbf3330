/**
 * Config Schema Validation
 *
 * Zod schemas for the powermeter configuration file.
 */

import { z } from 'zod';

// --- Reusable Validators ---

export const portSchema = z.number().int().min(1).max(65535);

export const hostSchema = z.string().min(1).refine(
  (val) => {
    const ipv4 = /^(\d{1,3}\.){3}\d{1,3}$/;
    const hostname = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?)*$/;
    return val === 'localhost' || ipv4.test(val) || hostname.test(val);
  },
  { message: 'Invalid host: must be IP address or hostname' }
);

export const DEFAULT_LISTEN_PORT = 10024;

// --- Sections ---

const deviceConfigSchema = z.object({
  host: hostSchema.default('127.0.0.1'),
  port: portSchema.default(10001),
  timeoutMs: z.number().int().min(100).default(3000),
  emulate: z.boolean().default(false),
});

const listenConfigSchema = z.object({
  host: hostSchema.default('0.0.0.0'),
  port: portSchema.default(DEFAULT_LISTEN_PORT),
});

const integrationConfigSchema = z.object({
  pollIntervalMs: z.number().int().min(10).default(1000),
});

const loggingConfigSchema = z.object({
  verbose: z.boolean().default(false),
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  pretty: z.boolean().optional(),
});

// --- Full Schema ---

export const meterConfigSchema = z.object({
  device: deviceConfigSchema.default({}),
  listen: listenConfigSchema.default({}),
  integration: integrationConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
  profile: z.string().min(1).optional(),
});

export type MeterConfigInput = z.input<typeof meterConfigSchema>;
export type MeterConfig = z.output<typeof meterConfigSchema>;

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
