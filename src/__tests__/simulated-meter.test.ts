import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { DeviceError } from '../errors';
import {
  ERR_ILLEGAL_VALUE,
  ERR_SETTINGS_CONFLICT,
  ERR_UNDEFINED_HEADER,
  SimulatedMeter,
} from '../emulators/simulated-meter';
import { profile } from './helpers';

function rejectsWithCode(code: number) {
  return (err: unknown): boolean => err instanceof DeviceError && err.code === code;
}

describe('SimulatedMeter', () => {
  let meter: SimulatedMeter;

  beforeEach(() => {
    meter = new SimulatedMeter(profile);
  });

  describe('properties', () => {
    it('answers queries with the default values', async () => {
      assert.equal(await meter.send(':INPUT:VOLTAGE:RANGE?'), '300');
      assert.equal(await meter.send(':RATE?'), '0.5');
      assert.equal(await meter.send('*IDN?'), 'POWERMETER,SIM-1,000000001,F1.00');
    });

    it('takes initial values from options', async () => {
      const custom = new SimulatedMeter(profile, { initial: { 'crest-factor': '6' } });
      assert.equal(await custom.send(':INPUT:CFACTOR?'), '6');
    });

    it('stores a value inside the domain in canonical form', async () => {
      assert.equal(await meter.send(':RATE 1.0'), 'OK');
      assert.equal(await meter.send(':RATE?'), '1');
      assert.equal(await meter.send(':INPUT:FILTER:LINE 5.5khz'), 'OK');
      assert.equal(await meter.send(':INPUT:FILTER:LINE?'), '5.5KHZ');
    });

    it('rejects a value outside the domain', async () => {
      await assert.rejects(meter.send(':INPUT:VOLTAGE:RANGE 42'), rejectsWithCode(ERR_ILLEGAL_VALUE));
      assert.equal(await meter.send(':INPUT:VOLTAGE:RANGE?'), '300');
    });

    it('rejects a set without a value', async () => {
      await assert.rejects(meter.send(':RATE'), rejectsWithCode(ERR_ILLEGAL_VALUE));
    });

    it('rejects unknown commands', async () => {
      await assert.rejects(meter.send(':BOGUS:HEADER 1'), rejectsWithCode(ERR_UNDEFINED_HEADER));
    });

    it('factory reset restores defaults', async () => {
      await meter.send(':INPUT:CFACTOR 6');
      assert.equal(await meter.send('*RST'), 'OK');
      assert.equal(await meter.send(':INPUT:CFACTOR?'), '3');
    });
  });

  describe('numeric readout', () => {
    it('reports the configured items in order', async () => {
      await meter.send(':NUMERIC:NORMAL:NUMBER 2');
      await meter.send(':NUMERIC:NORMAL:ITEM1 LAMBDA');
      await meter.send(':NUMERIC:NORMAL:ITEM2 fu');
      assert.equal(await meter.send(':NUMERIC:NORMAL:VALUE?'), '0.9500,50.0000');
    });

    it('rejects an item count above the maximum', async () => {
      await assert.rejects(meter.send(':NUMERIC:NORMAL:NUMBER 11'), rejectsWithCode(ERR_ILLEGAL_VALUE));
    });

    it('rejects an assignment beyond the item count', async () => {
      await meter.send(':NUMERIC:NORMAL:NUMBER 1');
      await assert.rejects(meter.send(':NUMERIC:NORMAL:ITEM2 U'), rejectsWithCode(ERR_ILLEGAL_VALUE));
    });

    it('rejects an unknown item id', async () => {
      await assert.rejects(meter.send(':NUMERIC:NORMAL:ITEM1 XYZ'), rejectsWithCode(ERR_ILLEGAL_VALUE));
    });

    it('waiting for an update advances the clock by one period', async () => {
      assert.equal(await meter.send(':COMMUNICATE:WAIT 1'), '1');
      await meter.send(':COMMUNICATE:WAIT 1');
      assert.equal(meter.getState().clockSeconds, 1);
    });
  });

  describe('integration', () => {
    it('starts, stops and resets', async () => {
      assert.equal(await meter.send(':INTEGRATE:STATE?'), 'RESET');
      await meter.send(':INTEGRATE:START');
      assert.equal(await meter.send(':INTEGRATE:STATE?'), 'START');
      await meter.send(':INTEGRATE:STOP');
      assert.equal(await meter.send(':INTEGRATE:STATE?'), 'STOP');
      await meter.send(':INTEGRATE:RESET');
      assert.equal(await meter.send(':INTEGRATE:STATE?'), 'RESET');
    });

    it('refuses to reset while running', async () => {
      await meter.send(':INTEGRATE:START');
      await assert.rejects(meter.send(':INTEGRATE:RESET'), rejectsWithCode(ERR_SETTINGS_CONFLICT));
      assert.equal(await meter.send(':INTEGRATE:STATE?'), 'START');
    });

    it('stops with TIMEUP when the timer elapses', async () => {
      await meter.send(':INTEGRATE:TIMER 0,0,1');
      await meter.send(':INTEGRATE:START');
      await meter.send(':COMMUNICATE:WAIT 1');
      assert.equal(await meter.send(':INTEGRATE:STATE?'), 'START');
      await meter.send(':COMMUNICATE:WAIT 1');
      assert.equal(await meter.send(':INTEGRATE:STATE?'), 'TIMEUP');
      assert.equal(meter.getState().integrationSeconds, 1);

      await assert.rejects(meter.send(':INTEGRATE:START'), rejectsWithCode(ERR_SETTINGS_CONFLICT));
    });

    it('accumulates elapsed time only while running', async () => {
      await meter.send(':COMMUNICATE:WAIT 1');
      await meter.send(':INTEGRATE:START');
      await meter.send(':COMMUNICATE:WAIT 1');
      await meter.send(':INTEGRATE:STOP');
      await meter.send(':COMMUNICATE:WAIT 1');
      await meter.send(':NUMERIC:NORMAL:NUMBER 1');
      await meter.send(':NUMERIC:NORMAL:ITEM1 TIME');
      assert.equal(await meter.send(':NUMERIC:NORMAL:VALUE?'), '0.5000');
    });
  });

  describe('command log', () => {
    it('records commands in order', async () => {
      await meter.send(':RATE?');
      await assert.rejects(meter.send(':RATE 7'));
      await meter.close();
      assert.deepEqual(meter.commands(), [':RATE?', ':RATE 7']);
      assert.deepEqual(meter.getLog().map((e) => e.reply), ['0.5', 'ERR -224', '']);
    });

    it('clearLog empties the log', async () => {
      await meter.send(':RATE?');
      meter.clearLog();
      assert.deepEqual(meter.commands(), []);
    });
  });
});
