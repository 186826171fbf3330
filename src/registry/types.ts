/**
 * Instrument Profile Types
 *
 * The profile is the translation layer between the user-facing vocabulary
 * ("voltage-range", "smoothing on") and the command strings the meter
 * understands. Loaded once from instrument.yml and shared read-only.
 */

export interface PropertyDescriptor {
  readonly name: string;
  readonly getCommand: string;
  /** Absent for read-only properties */
  readonly setCommand?: string;
  readonly helpText: string;
}

export interface DataItem {
  readonly id: string;
  readonly description: string;
}

export interface IntegrationCommands {
  readonly start: string;
  readonly stop: string;
  readonly reset: string;
  readonly state: string;
  /** State replies (upper-cased) that mean integration is in progress */
  readonly runningStates: readonly string[];
}

export interface ReadoutCommands {
  /** Sets how many items the numeric readout carries */
  readonly itemCount: string;
  /** Item k is assigned with `${itemPrefix}${k} <id>` */
  readonly itemPrefix: string;
  /** Blocks until the next measurement update */
  readonly waitUpdate: string;
  /** Query for the data update interval, answered in seconds */
  readonly updatePeriod: string;
  /** Returns the current values of the configured items, comma-separated */
  readonly values: string;
  readonly maxItems: number;
}

export interface ActionCommands {
  readonly calibrate: string;
  readonly factoryReset: string;
}

export interface SmoothingBinding {
  readonly property: string;
  readonly on: string;
  readonly off: string;
}

export interface InstrumentProfile {
  readonly model: string;
  readonly properties: readonly PropertyDescriptor[];
  readonly dataItems: readonly DataItem[];
  readonly integration: IntegrationCommands;
  readonly readout: ReadoutCommands;
  readonly actions: ActionCommands;
  readonly smoothing: SmoothingBinding;
}
