/**
 * Runtime wiring
 *
 * Builds the object graph once from config and profile. The transport is
 * the single owner of the device connection; every path (local command
 * or remote client) reaches the instrument through this one executor.
 */

import { MeterConfig } from './config-schema';
import { CommandDispatcher } from './commands/dispatcher';
import { RequestGrammar, grammarFor } from './commands/request-parser';
import { CommandExecutor } from './device/command-executor';
import { IntegrationController, Sleep } from './device/integration-controller';
import { ReadLoop } from './device/read-loop';
import { SimulatedMeter } from './emulators/simulated-meter';
import { PropertyRegistry } from './registry/property-registry';
import { InstrumentProfile } from './registry/types';
import { TcpTransport } from './transport/tcp-transport';
import { Transport } from './transport/transport';

export interface MeterRuntime {
  profile: InstrumentProfile;
  registry: PropertyRegistry;
  grammar: RequestGrammar;
  transport: Transport;
  executor: CommandExecutor;
  integration: IntegrationController;
  readLoop: ReadLoop;
  dispatcher: CommandDispatcher;
}

export interface RuntimeOptions {
  /** Use this transport instead of the one the config describes */
  transport?: Transport;
  sleep?: Sleep;
  now?: () => number;
}

export function createTransport(config: MeterConfig, profile: InstrumentProfile): Transport {
  if (config.device.emulate) {
    return new SimulatedMeter(profile, { pace: true });
  }
  return new TcpTransport({
    host: config.device.host,
    port: config.device.port,
    timeoutMs: config.device.timeoutMs,
  });
}

export function createRuntime(
  config: MeterConfig,
  profile: InstrumentProfile,
  options: RuntimeOptions = {},
): MeterRuntime {
  const registry = new PropertyRegistry(profile.properties);
  const transport = options.transport ?? createTransport(config, profile);
  const executor = new CommandExecutor(transport);
  const integration = new IntegrationController(executor, profile.integration, {
    pollIntervalMs: config.integration.pollIntervalMs,
    sleep: options.sleep,
  });
  const readLoop = new ReadLoop(executor, integration, profile.readout, { now: options.now });
  const dispatcher = new CommandDispatcher({ profile, registry, executor, integration, readLoop });

  return {
    profile,
    registry,
    grammar: grammarFor(profile),
    transport,
    executor,
    integration,
    readLoop,
    dispatcher,
  };
}
