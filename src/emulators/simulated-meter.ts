/**
 * SimulatedMeter: in-process stand-in for the power meter
 *
 * Implements the Transport interface so the executor, read loop and
 * remote session see no difference between a real instrument and the
 * emulator. It understands exactly the command strings of the loaded
 * instrument profile and answers the way the gateway does:
 *   - property queries return the stored value
 *   - property sets are checked against the value domains below and
 *     rejected with code -224 when out of domain
 *   - resetting a running integration is rejected with code -221
 *   - every "wait for update" advances an emulated clock by one update
 *     period; a running integration accumulates energy and stops with
 *     TIMEUP once the integration timer (if any) has elapsed
 *
 * A bounded command log records every request for inspection.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { DeviceError } from '../errors';
import { InstrumentProfile, PropertyDescriptor } from '../registry/types';
import { Transport } from '../transport/transport';

export interface EmulatorLogEntry {
  timestamp: number;
  command: string;
  reply: string;
}

export interface SimulatedMeterOptions {
  /** Sleep one real update period on every wait, for interactive use */
  pace?: boolean;
  /** Initial property values, by property name */
  initial?: Record<string, string>;
}

type Domain = readonly string[] | RegExp;

const ON_OFF: Domain = ['ON', 'OFF'];

const DOMAINS: Record<string, Domain> = {
  'voltage-range': ['15', '30', '60', '150', '300', '600'],
  'voltage-auto': ON_OFF,
  'current-range': ['0.5', '1', '2', '5', '10', '20'],
  'current-auto': ON_OFF,
  'crest-factor': ['3', '6'],
  'line-filter': ['OFF', '500HZ', '5.5KHZ'],
  'update-rate': ['0.1', '0.25', '0.5', '1', '2', '5'],
  'smoothing': ON_OFF,
  'smoothing-count': ['8', '16', '32', '64'],
  'integration-mode': ['NORMAL', 'CONTINUOUS'],
  'integration-timer': /^\d{1,5},[0-5]?\d,[0-5]?\d$/,
};

const DEFAULTS: Record<string, string> = {
  'id': 'POWERMETER,SIM-1,000000001,F1.00',
  'voltage-range': '300',
  'voltage-auto': 'ON',
  'current-range': '5',
  'current-auto': 'ON',
  'crest-factor': '3',
  'line-filter': 'OFF',
  'update-rate': '0.5',
  'smoothing': 'OFF',
  'smoothing-count': '8',
  'integration-mode': 'NORMAL',
  'integration-timer': '0,0,0',
  'error': '0,"No error"',
};

export type SimulatedIntegrationState = 'RESET' | 'START' | 'STOP' | 'TIMEUP';

export const ERR_SETTINGS_CONFLICT = -221;
export const ERR_ILLEGAL_VALUE = -224;
export const ERR_UNDEFINED_HEADER = -113;

export class SimulatedMeter implements Transport {
  readonly target = 'emulator';

  private readonly profile: InstrumentProfile;
  private readonly pace: boolean;
  private readonly initial: Record<string, string>;
  private values = new Map<string, string>();
  private getters = new Map<string, PropertyDescriptor>();
  private setters = new Map<string, PropertyDescriptor>();

  private items: string[] = [];
  private integrationState: SimulatedIntegrationState = 'RESET';
  private integrationSeconds = 0;
  private wattHours = 0;
  private ampHours = 0;
  private clockSeconds = 0;
  private updates = 0;

  private _log: EmulatorLogEntry[] = [];
  private readonly maxLogSize = 200;

  constructor(profile: InstrumentProfile, options: SimulatedMeterOptions = {}) {
    this.profile = profile;
    this.pace = options.pace ?? false;
    this.initial = options.initial ?? {};
    for (const descriptor of profile.properties) {
      this.getters.set(descriptor.getCommand.toUpperCase(), descriptor);
      if (descriptor.setCommand) {
        this.setters.set(descriptor.setCommand.toUpperCase(), descriptor);
      }
    }
    this.restoreDefaults();
  }

  async send(command: string): Promise<string> {
    try {
      const reply = await this.handle(command.trim());
      this.record(command, reply);
      return reply;
    } catch (err) {
      this.record(command, err instanceof DeviceError ? `ERR ${err.code ?? ''}` : 'ERR');
      throw err;
    }
  }

  async close(): Promise<void> {
    this.record('(close)', '');
  }

  // --- Inspection ---

  getLog(): EmulatorLogEntry[] {
    return [...this._log];
  }

  /** Commands received so far, oldest first */
  commands(): string[] {
    return this._log.filter((e) => e.command !== '(close)').map((e) => e.command);
  }

  clearLog(): void {
    this._log = [];
  }

  getState(): Record<string, string | number | string[]> {
    return {
      integration: this.integrationState,
      integrationSeconds: this.integrationSeconds,
      wattHours: this.wattHours,
      items: [...this.items],
      clockSeconds: this.clockSeconds,
      ...Object.fromEntries(this.values),
    };
  }

  // --- Command handling ---

  private async handle(command: string): Promise<string> {
    const { readout, integration, actions } = this.profile;
    const upper = command.toUpperCase();

    if (upper === readout.waitUpdate.toUpperCase()) {
      await this.advance();
      return '1';
    }
    if (upper === readout.values.toUpperCase()) {
      return this.measure();
    }

    const getter = this.getters.get(upper);
    if (getter) {
      return this.values.get(getter.name) ?? '';
    }

    switch (upper) {
      case integration.start.toUpperCase():
        return this.startIntegration();
      case integration.stop.toUpperCase():
        if (this.integrationState === 'START') this.integrationState = 'STOP';
        return 'OK';
      case integration.reset.toUpperCase():
        return this.resetIntegration();
      case integration.state.toUpperCase():
        return this.integrationState;
      case actions.calibrate.toUpperCase():
        return 'OK';
      case actions.factoryReset.toUpperCase():
        this.restoreDefaults();
        return 'OK';
    }

    const space = command.search(/\s/);
    const verb = (space === -1 ? command : command.slice(0, space)).toUpperCase();
    const argument = space === -1 ? '' : command.slice(space + 1).trim();

    const setter = this.setters.get(verb);
    if (setter) {
      return this.setValue(setter, argument);
    }
    if (verb === readout.itemCount.toUpperCase()) {
      return this.setItemCount(argument);
    }
    const prefix = readout.itemPrefix.toUpperCase();
    if (verb.startsWith(prefix)) {
      return this.setItem(verb.slice(prefix.length), argument);
    }

    throw new DeviceError(`Undefined header "${verb}"`, { code: ERR_UNDEFINED_HEADER });
  }

  private setValue(descriptor: PropertyDescriptor, argument: string): string {
    const domain = DOMAINS[descriptor.name];
    const value = argument.toUpperCase();
    if (!value || (domain && !inDomain(domain, value))) {
      throw new DeviceError(`Illegal parameter value "${argument}" for ${descriptor.name}`, {
        code: ERR_ILLEGAL_VALUE,
      });
    }
    this.values.set(descriptor.name, canonical(domain, value));
    return 'OK';
  }

  private setItemCount(argument: string): string {
    const count = Number(argument);
    if (!Number.isInteger(count) || count < 1 || count > this.profile.readout.maxItems) {
      throw new DeviceError(`Illegal item count "${argument}"`, { code: ERR_ILLEGAL_VALUE });
    }
    this.items = this.items.slice(0, count);
    while (this.items.length < count) this.items.push('U');
    return 'OK';
  }

  private setItem(ordinal: string, argument: string): string {
    const index = Number(ordinal) - 1;
    const id = argument.toUpperCase();
    const known = this.profile.dataItems.some((item) => item.id === id);
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length || !known) {
      throw new DeviceError(`Illegal item assignment "${ordinal} ${argument}"`, { code: ERR_ILLEGAL_VALUE });
    }
    this.items[index] = id;
    return 'OK';
  }

  private startIntegration(): string {
    if (this.integrationState === 'TIMEUP') {
      throw new DeviceError('Integration timer expired; reset first', { code: ERR_SETTINGS_CONFLICT });
    }
    this.integrationState = 'START';
    return 'OK';
  }

  private resetIntegration(): string {
    if (this.integrationState === 'START') {
      throw new DeviceError('Cannot reset a running integration', { code: ERR_SETTINGS_CONFLICT });
    }
    this.integrationState = 'RESET';
    this.integrationSeconds = 0;
    this.wattHours = 0;
    this.ampHours = 0;
    return 'OK';
  }

  private restoreDefaults(): void {
    this.values.clear();
    for (const descriptor of this.profile.properties) {
      const value = this.initial[descriptor.name] ?? DEFAULTS[descriptor.name] ?? '0';
      this.values.set(descriptor.name, value);
    }
    this.items = ['U', 'I', 'P'];
    this.integrationState = 'RESET';
    this.integrationSeconds = 0;
    this.wattHours = 0;
    this.ampHours = 0;
  }

  // --- Emulated physics ---

  private updatePeriod(): number {
    const rate = Number(this.values.get('update-rate'));
    return Number.isFinite(rate) && rate > 0 ? rate : 0.5;
  }

  private integrationTimerSeconds(): number {
    const timer = this.values.get('integration-timer') ?? '0,0,0';
    const [h, m, s] = timer.split(',').map(Number);
    return (h || 0) * 3600 + (m || 0) * 60 + (s || 0);
  }

  private async advance(): Promise<void> {
    const period = this.updatePeriod();
    if (this.pace) {
      await sleep(period * 1000);
    }
    this.clockSeconds += period;
    this.updates++;

    if (this.integrationState === 'START') {
      const { current, power } = this.readings();
      this.integrationSeconds += period;
      this.wattHours += (power * period) / 3600;
      this.ampHours += (current * period) / 3600;
      const timer = this.integrationTimerSeconds();
      if (timer > 0 && this.integrationSeconds >= timer) {
        this.integrationState = 'TIMEUP';
      }
    }
  }

  private readings(): { voltage: number; current: number; power: number } {
    const voltage = 230 + Math.sin(this.updates / 3) * 0.8;
    const current = 1.5 + Math.cos(this.updates / 5) * 0.05;
    return { voltage, current, power: voltage * current * 0.95 };
  }

  private measure(): string {
    const { voltage, current, power } = this.readings();
    const apparent = voltage * current;
    const values: Record<string, number> = {
      U: voltage,
      I: current,
      P: power,
      S: apparent,
      Q: Math.sqrt(Math.max(0, apparent * apparent - power * power)),
      LAMBDA: 0.95,
      PHI: (Math.acos(0.95) * 180) / Math.PI,
      FU: 50,
      FI: 50,
      UPPEAK: voltage * Math.SQRT2,
      IPPEAK: current * Math.SQRT2,
      TIME: this.integrationSeconds,
      WH: this.wattHours,
      AH: this.ampHours,
    };
    return this.items.map((id) => (values[id] ?? 0).toFixed(4)).join(',');
  }

  private record(command: string, reply: string): void {
    this._log.push({ timestamp: Date.now(), command, reply });
    if (this._log.length > this.maxLogSize) {
      this._log.shift();
    }
  }
}

function inDomain(domain: Domain, value: string): boolean {
  if (domain instanceof RegExp) return domain.test(value);
  return domain.some((allowed) => allowed === value || numericEqual(allowed, value));
}

function canonical(domain: Domain | undefined, value: string): string {
  if (!domain || domain instanceof RegExp) return value;
  return domain.find((allowed) => allowed === value || numericEqual(allowed, value)) ?? value;
}

function numericEqual(a: string, b: string): boolean {
  const x = Number(a);
  const y = Number(b);
  return a !== '' && b !== '' && Number.isFinite(x) && Number.isFinite(y) && x === y;
}
