import { describe, it, expect } from 'vitest';
import { aliasesFor, idFromName, normalizeAlias } from '../../src/registry/aliases.js';

describe('normalizeAlias()', () => {
  it('makes different spellings of one name converge', () => {
    const spellings = ['Battery Level', 'battery_level', 'BATTERY-LEVEL', '  battery   level ', 'Battery__Level'];
    expect(new Set(spellings.map(normalizeAlias))).toEqual(new Set(['battery level']));
  });
});

describe('aliasesFor()', () => {
  it('includes the name, the id string and the id tail', () => {
    expect(
      aliasesFor({ name: 'Battery Level', id: 'org.bluetooth.characteristic.battery_level' }),
    ).toEqual(['battery level', 'org.bluetooth.characteristic.battery level']);
  });

  it('adds the tail when it differs from the name', () => {
    expect(aliasesFor({ name: 'Device Name', id: 'org.bluetooth.characteristic.gap.device_name' })).toEqual([
      'device name',
      'org.bluetooth.characteristic.gap.device name',
    ]);
    expect(aliasesFor({ name: 'Heart Rate', id: 'org.example.hr' })).toEqual([
      'heart rate',
      'org.example.hr',
      'hr',
    ]);
  });

  it('skips an empty id', () => {
    expect(aliasesFor({ name: 'Thing', id: '' })).toEqual(['thing']);
  });
});

describe('idFromName()', () => {
  it('derives a snake_case id string', () => {
    expect(idFromName('Heart Rate Measurement')).toBe('org.bluetooth.characteristic.heart_rate_measurement');
    expect(idFromName('PM2.5 Concentration')).toBe('org.bluetooth.characteristic.pm2_5_concentration');
  });
});
