import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../errors';
import { ProfileInput, buildProfile, loadInstrumentProfile } from '../registry/instrument-profile';

function minimalProfile(): ProfileInput {
  return {
    model: 'test meter',
    properties: [
      { name: 'rate', get: ':RATE?', set: ':RATE', help: 'Update rate' },
      { name: 'avg', get: ':AVG?', set: ':AVG', help: 'Averaging' },
      { name: 'serial', get: '*IDN?' },
    ],
    dataItems: [{ id: 'u' }, { id: 'i', description: 'Current' }],
    readout: { itemCount: ':NUM', itemPrefix: ':ITEM', waitUpdate: ':WAIT', updatePeriod: ':RATE?', values: ':VAL?', maxItems: 2 },
    integration: { start: ':I:GO', stop: ':I:HALT', reset: ':I:CLR', state: ':I:ST?', runningStates: ['run', 'busy'] },
    actions: { calibrate: ':CAL', factoryReset: '*RST' },
    smoothing: { property: 'avg', on: '1', off: '0' },
  };
}

describe('buildProfile', () => {
  it('maps a document onto the profile types', () => {
    const profile = buildProfile(minimalProfile());
    assert.equal(profile.model, 'test meter');
    assert.deepEqual(profile.properties[0], {
      name: 'rate',
      getCommand: ':RATE?',
      setCommand: ':RATE',
      helpText: 'Update rate',
    });
    assert.equal(profile.properties[2].setCommand, undefined);
    assert.equal(profile.properties[2].helpText, '');
  });

  it('upper-cases item ids and running states', () => {
    const profile = buildProfile(minimalProfile());
    assert.deepEqual(profile.dataItems.map((item) => item.id), ['U', 'I']);
    assert.deepEqual(profile.integration.runningStates, ['RUN', 'BUSY']);
  });

  it('rejects a smoothing binding to a read-only property', () => {
    const doc = minimalProfile();
    doc.smoothing = { property: 'serial', on: '1', off: '0' };
    assert.throws(() => buildProfile(doc), {
      name: 'ConfigError',
      message: 'Invalid instrument profile:\n  - smoothing.property: "serial" must name a settable property',
    });
  });

  it('rejects duplicate data item ids', () => {
    const doc = minimalProfile();
    doc.dataItems = [{ id: 'U' }, { id: 'u' }];
    assert.throws(() => buildProfile(doc), {
      message: 'Invalid instrument profile:\n  - dataItems: Duplicate data item id',
    });
  });

  it('rejects duplicate property names', () => {
    const doc = minimalProfile();
    doc.properties = [...doc.properties, { name: 'rate', get: ':RATE2?' }];
    assert.throws(() => buildProfile(doc), {
      name: 'ConfigError',
      message: 'Invalid instrument profile:\n  - properties: Duplicate property name: rate',
    });
  });

  it('rejects a missing readout section', () => {
    assert.throws(() => buildProfile({ ...minimalProfile(), readout: undefined }), ConfigError);
  });
});

describe('loadInstrumentProfile', () => {
  it('loads the bundled profile', () => {
    const profile = loadInstrumentProfile();
    assert.equal(profile.properties.length, 13);
    assert.equal(profile.dataItems.length, 14);
    assert.equal(profile.readout.maxItems, 10);
    assert.equal(profile.readout.waitUpdate, ':COMMUNICATE:WAIT 1');
    assert.equal(profile.readout.updatePeriod, ':RATE?');
    assert.deepEqual(profile.integration.runningStates, ['START']);
    assert.deepEqual(profile.smoothing, { property: 'smoothing', on: 'ON', off: 'OFF' });
  });

  it('reports a missing file as a config error', () => {
    assert.throws(() => loadInstrumentProfile('/nonexistent/instrument.yml'), ConfigError);
  });

  it('reports malformed YAML as a config error', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'powermeter-profile-'));
    const file = path.join(dir, 'broken.yml');
    fs.writeFileSync(file, 'properties: [unclosed\n');
    try {
      assert.throws(() => loadInstrumentProfile(file), (err: unknown) => {
        return err instanceof ConfigError && err.message.startsWith(`Instrument profile ${file} is not valid YAML`);
      });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
