/**
 * ReadLoop
 *
 * Configures the numeric readout with the requested items, then samples
 * once per device update until the policy says stop. Every stop check
 * runs before the blocking wait, so a loop that is done never waits for
 * one more update. Interruption is a normal outcome, not an error.
 *
 * A slow update interval can exceed the transport's reply timeout, so
 * the update period is queried once per run and every wait is allowed
 * that much extra time.
 */

import { Logger } from 'pino';
import { DeviceError } from '../errors';
import { getLogger } from '../logger';
import { ReadoutCommands } from '../registry/types';
import { CommandExecutor } from './command-executor';
import { IntegrationController } from './integration-controller';

export type ReadPolicy =
  | { kind: 'count'; limit: number | 'forever' }
  | { kind: 'duration'; seconds: number }
  | { kind: 'until-integration-ends' };

export type TerminationReason = 'count-reached' | 'time-elapsed' | 'integration-ended' | 'interrupted';

export interface ReadSummary {
  reason: TerminationReason;
  samples: number;
}

export interface ReadLoopOptions {
  /** Milliseconds clock; injected for tests */
  now?: () => number;
}

export class ReadLoop {
  private executor: CommandExecutor;
  private integration: IntegrationController;
  private readout: ReadoutCommands;
  private now: () => number;
  private log: Logger;

  constructor(
    executor: CommandExecutor,
    integration: IntegrationController,
    readout: ReadoutCommands,
    options: ReadLoopOptions = {},
  ) {
    this.executor = executor;
    this.integration = integration;
    this.readout = readout;
    this.now = options.now ?? Date.now;
    this.log = getLogger('ReadLoop');
  }

  /** Assign items 1..N of the numeric readout */
  async configure(items: readonly string[]): Promise<void> {
    await this.executor.execute(this.readout.itemCount, String(items.length));
    for (let i = 0; i < items.length; i++) {
      await this.executor.execute(`${this.readout.itemPrefix}${i + 1}`, items[i]);
    }
  }

  /** Current data update interval of the device, in milliseconds */
  async updatePeriodMs(): Promise<number> {
    const reply = await this.executor.execute(this.readout.updatePeriod);
    const seconds = Number(reply);
    if (reply === '' || !Number.isFinite(seconds) || seconds < 0) {
      throw new DeviceError(`Unexpected update period "${reply}" from "${this.readout.updatePeriod}"`);
    }
    return Math.ceil(seconds * 1000);
  }

  async run(
    items: readonly string[],
    policy: ReadPolicy,
    onSample: (sample: string) => void,
    signal?: AbortSignal,
  ): Promise<ReadSummary> {
    await this.configure(items);
    const waitOptions = { extraTimeoutMs: await this.updatePeriodMs() };

    const startedAt = this.now();
    let samples = 0;
    const finish = (reason: TerminationReason): ReadSummary => {
      this.log.debug({ reason, samples }, 'Read loop finished');
      return { reason, samples };
    };

    for (;;) {
      if (signal?.aborted) return finish('interrupted');

      if (policy.kind === 'until-integration-ends') {
        if ((await this.integration.queryState()) !== 'running') return finish('integration-ended');
      }
      if (policy.kind === 'duration') {
        if ((this.now() - startedAt) / 1000 >= policy.seconds) return finish('time-elapsed');
      }
      if (policy.kind === 'count' && policy.limit !== 'forever' && samples >= policy.limit) {
        return finish('count-reached');
      }

      await this.executor.execute(this.readout.waitUpdate, undefined, waitOptions);
      if (signal?.aborted) return finish('interrupted');

      onSample(await this.executor.execute(this.readout.values));
      samples++;
    }
  }
}
