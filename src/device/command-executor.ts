/**
 * CommandExecutor
 *
 * Sends exactly one command per call through the transport and returns
 * exactly one reply. Transport failures of any shape come out as
 * DeviceError; property sets the device refuses come out as
 * BadArgumentError.
 */

import { Logger } from 'pino';
import { BadArgumentError, DeviceError, errorMessage } from '../errors';
import { getLogger } from '../logger';
import { PropertyDescriptor } from '../registry/types';
import { SendOptions, Transport } from '../transport/transport';

/** Wire-level request, built per dispatch */
export interface DeviceCommand {
  verb: string;
  argument?: string;
}

/** Value that asks for a property's help text instead of setting it */
export const HELP_VALUE = '?';

export type SetOutcome =
  | { kind: 'applied'; value: string }
  | { kind: 'help'; text: string };

export function renderCommand(command: DeviceCommand): string {
  return command.argument === undefined || command.argument === ''
    ? command.verb
    : `${command.verb} ${command.argument}`;
}

export class CommandExecutor {
  private transport: Transport;
  private log: Logger;

  constructor(transport: Transport) {
    this.transport = transport;
    this.log = getLogger('CommandExecutor');
  }

  get target(): string {
    return this.transport.target;
  }

  async execute(verb: string, argument?: string, options?: SendOptions): Promise<string> {
    const line = renderCommand({ verb, argument });
    this.log.debug({ command: line }, 'execute');
    try {
      return (await this.transport.send(line, options)).trim();
    } catch (err) {
      if (err instanceof DeviceError) throw err;
      throw new DeviceError(`Transport failure on "${line}": ${errorMessage(err)}`, { cause: err });
    }
  }

  getProperty(descriptor: PropertyDescriptor): Promise<string> {
    return this.execute(descriptor.getCommand);
  }

  async setProperty(descriptor: PropertyDescriptor, value: string): Promise<SetOutcome> {
    if (descriptor.setCommand === undefined) {
      throw new BadArgumentError(`Property "${descriptor.name}" is read-only`);
    }
    if (value === HELP_VALUE) {
      return { kind: 'help', text: describeSet(descriptor) };
    }
    if (value.trim() === '') {
      throw new BadArgumentError(`Property "${descriptor.name}" needs a value`);
    }

    try {
      await this.execute(descriptor.setCommand, value);
    } catch (err) {
      if (err instanceof DeviceError && err.code !== undefined) {
        throw new BadArgumentError(`Invalid value "${value}" for ${descriptor.name}: ${descriptor.helpText}`, {
          cause: err,
        });
      }
      throw err;
    }
    return { kind: 'applied', value };
  }
}

/** Help text shown for `set <property> ?` */
export function describeSet(descriptor: PropertyDescriptor): string {
  return `${descriptor.name} (${descriptor.setCommand ?? 'read-only'}): ${descriptor.helpText}`;
}
