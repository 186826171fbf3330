/**
 * IntegrationController
 *
 * Start/stop/reset/query the meter's integrator. The state is never
 * cached: every decision that depends on it queries the device first.
 * The device refuses a reset while integrating, so reset() stops a
 * running integration itself before resetting.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { Logger } from 'pino';
import { InterruptedError } from '../errors';
import { getLogger } from '../logger';
import { IntegrationCommands } from '../registry/types';
import { CommandExecutor } from './command-executor';

export type IntegrationState = 'running' | 'stopped';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface IntegrationControllerOptions {
  pollIntervalMs?: number;
  /** Injected for tests; defaults to an abortable timer */
  sleep?: Sleep;
}

const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) return;
    throw err;
  }
};

export class IntegrationController {
  private executor: CommandExecutor;
  private commands: IntegrationCommands;
  private pollIntervalMs: number;
  private sleep: Sleep;
  private log: Logger;

  constructor(executor: CommandExecutor, commands: IntegrationCommands, options: IntegrationControllerOptions = {}) {
    this.executor = executor;
    this.commands = commands;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.sleep = options.sleep ?? abortableSleep;
    this.log = getLogger('Integration');
  }

  async start(): Promise<void> {
    await this.executor.execute(this.commands.start);
  }

  async stop(): Promise<void> {
    await this.executor.execute(this.commands.stop);
  }

  /** `notice` receives operator-facing progress, e.g. the implicit stop */
  async reset(notice?: (message: string) => void): Promise<void> {
    if ((await this.queryState()) === 'running') {
      const message = 'Integration running, stopping before reset';
      this.log.info(message);
      notice?.(message);
      await this.stop();
    }
    await this.executor.execute(this.commands.reset);
  }

  /** Raw device reply, e.g. "START" or "RESET" */
  queryRaw(): Promise<string> {
    return this.executor.execute(this.commands.state);
  }

  async queryState(): Promise<IntegrationState> {
    return this.toState(await this.queryRaw());
  }

  toState(reply: string): IntegrationState {
    return this.commands.runningStates.includes(reply.trim().toUpperCase()) ? 'running' : 'stopped';
  }

  /**
   * Poll until the integration leaves the running state. The device has
   * no completion notification and a single request cannot outlast the
   * transport timeout, so this is a fixed-interval poll.
   */
  async wait(signal?: AbortSignal): Promise<void> {
    for (;;) {
      if (signal?.aborted) throw new InterruptedError('Integration wait interrupted');
      if ((await this.queryState()) !== 'running') return;
      this.log.debug(`Integration running, polling again in ${this.pollIntervalMs}ms`);
      await this.sleep(this.pollIntervalMs, signal);
    }
  }
}
