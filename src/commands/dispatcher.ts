/**
 * Command Dispatcher
 *
 * Executes a parsed MeterRequest against the instrument and writes the
 * outcome to the caller's OutputSink. Expected failures come back as a
 * Result; anything outside the error taxonomy propagates to the caller.
 */

import { Logger } from 'pino';
import { Result, UsageError, toResult } from '../errors';
import { getLogger } from '../logger';
import { CommandExecutor, HELP_VALUE, describeSet } from '../device/command-executor';
import { IntegrationController } from '../device/integration-controller';
import { ReadLoop, ReadPolicy, ReadSummary, TerminationReason } from '../device/read-loop';
import { PropertyRegistry } from '../registry/property-registry';
import { InstrumentProfile, PropertyDescriptor } from '../registry/types';
import { COMMAND_SUMMARY, IntegrationAction, MeterRequest, SmoothingMode } from './request-parser';
import { OutputSink } from './output-sink';

/** Anything that can run a request; the remote session depends only on this */
export interface RequestHandler {
  dispatch(request: MeterRequest, sink: OutputSink, signal?: AbortSignal): Promise<Result<void>>;
}

export interface CommandDispatcherDeps {
  profile: InstrumentProfile;
  registry: PropertyRegistry;
  executor: CommandExecutor;
  integration: IntegrationController;
  readLoop: ReadLoop;
}

const TERMINATION_TEXT: Record<TerminationReason, string> = {
  'count-reached': 'sample count reached',
  'time-elapsed': 'time limit elapsed',
  'integration-ended': 'integration ended',
  'interrupted': 'interrupted',
};

export class CommandDispatcher implements RequestHandler {
  private profile: InstrumentProfile;
  private registry: PropertyRegistry;
  private executor: CommandExecutor;
  private integration: IntegrationController;
  private readLoop: ReadLoop;
  private log: Logger;

  constructor(deps: CommandDispatcherDeps) {
    this.profile = deps.profile;
    this.registry = deps.registry;
    this.executor = deps.executor;
    this.integration = deps.integration;
    this.readLoop = deps.readLoop;
    this.log = getLogger('Dispatcher');
  }

  dispatch(request: MeterRequest, sink: OutputSink, signal?: AbortSignal): Promise<Result<void>> {
    this.log.debug({ request }, 'dispatch');
    return toResult(this.run(request, sink, signal));
  }

  private async run(request: MeterRequest, sink: OutputSink, signal?: AbortSignal): Promise<void> {
    switch (request.command) {
      case 'info':
        return this.info(sink);
      case 'get':
        return this.get(request.property, sink);
      case 'set':
        return this.set(request.property, request.value, sink);
      case 'integration':
        return this.integrate(request.action, sink, signal);
      case 'smoothing':
        return this.smoothing(request.mode, sink);
      case 'calibrate':
        await this.executor.execute(this.profile.actions.calibrate);
        sink.info('Calibration done');
        return;
      case 'factory-reset':
        await this.executor.execute(this.profile.actions.factoryReset);
        sink.info('Factory settings restored');
        return;
      case 'read':
        await this.read(request.items, request.policy, sink, signal);
        return;
      case 'help':
        return this.help(sink);
      case 'listen':
        throw new UsageError('listen can only be started from the command line, not from inside a session');
    }
  }

  private resolve(name: string): PropertyDescriptor {
    const descriptor = this.registry.lookup(name);
    if (!descriptor) {
      throw new UsageError(`Unknown property "${name}"; "help" lists the available properties`);
    }
    return descriptor;
  }

  private async info(sink: OutputSink): Promise<void> {
    sink.info(`Instrument: ${this.profile.model} @ ${this.executor.target}`);
    const descriptors = this.registry.forGet();
    const width = Math.max(...descriptors.map((d) => d.name.length));
    for (const descriptor of descriptors) {
      const value = await this.executor.getProperty(descriptor);
      sink.info(`${descriptor.name.padEnd(width)}  ${value}`);
    }
  }

  private async get(name: string, sink: OutputSink): Promise<void> {
    const descriptor = this.resolve(name);
    sink.info(`${descriptor.name}: ${await this.executor.getProperty(descriptor)}`);
  }

  private async set(name: string, value: string, sink: OutputSink): Promise<void> {
    const descriptor = this.resolve(name);
    const outcome = await this.executor.setProperty(descriptor, value);
    if (outcome.kind === 'help') {
      sink.info(outcome.text);
      return;
    }
    sink.info(`${descriptor.name} set to ${outcome.value}`);
  }

  private async smoothing(mode: SmoothingMode, sink: OutputSink): Promise<void> {
    const binding = this.profile.smoothing;
    const descriptor = this.resolve(binding.property);
    if (mode === HELP_VALUE) {
      sink.info(describeSet(descriptor));
      return;
    }
    await this.executor.setProperty(descriptor, mode === 'on' ? binding.on : binding.off);
    sink.info(`Smoothing ${mode}`);
  }

  private async integrate(action: IntegrationAction, sink: OutputSink, signal?: AbortSignal): Promise<void> {
    switch (action) {
      case 'start':
        await this.integration.start();
        sink.info('Integration started');
        return;
      case 'stop':
        await this.integration.stop();
        sink.info('Integration stopped');
        return;
      case 'reset':
        await this.integration.reset((message) => sink.info(message));
        sink.info('Integration reset');
        return;
      case 'state': {
        const raw = await this.integration.queryRaw();
        sink.info(`Integration ${this.integration.toState(raw)} (${raw})`);
        return;
      }
      case 'wait':
        sink.info('Waiting for integration to finish');
        await this.integration.wait(signal);
        sink.info('Integration finished');
        return;
    }
  }

  private async read(
    items: readonly string[],
    policy: ReadPolicy,
    sink: OutputSink,
    signal?: AbortSignal,
  ): Promise<ReadSummary> {
    sink.info(items.join(','));
    const summary = await this.readLoop.run(items, policy, (sample) => sink.info(sample), signal);
    sink.info(`Read ${summary.samples} sample(s): ${TERMINATION_TEXT[summary.reason]}`);
    return summary;
  }

  private help(sink: OutputSink): void {
    sink.info('Commands:');
    const width = Math.max(...COMMAND_SUMMARY.map(([usage]) => usage.length));
    for (const [usage, text] of COMMAND_SUMMARY) {
      sink.info(`  ${usage.padEnd(width)}  ${text}`);
    }
    sink.info('Readable properties:');
    sink.info(`  ${this.registry.forGet().map((d) => d.name).join(', ')}`);
    sink.info('Settable properties:');
    sink.info(`  ${this.registry.forSet().map((d) => d.name).join(', ')}`);
    sink.info('Data items:');
    for (const item of this.profile.dataItems) {
      sink.info(`  ${item.id.padEnd(8)}${item.description}`);
    }
  }
}
