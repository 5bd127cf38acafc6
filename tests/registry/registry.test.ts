import { describe, it, expect, afterEach } from 'vitest';
import { BatteryLevelCharacteristic } from '../../src/characteristics/battery-level.js';
import { BUILTIN_CHARACTERISTICS } from '../../src/characteristics/index.js';
import {
  _resetDefaultRegistry,
  CharacteristicRegistry,
  getDefaultRegistry,
} from '../../src/registry/registry.js';
import { StaticSpecSource, type SpecData, type SpecSource, YamlSpecSource } from '../../src/registry/spec-source.js';
import {
  createMockLogger,
  createTestRegistry,
  RawBytesCharacteristic,
  TEST_ENTRIES,
} from '../helpers/codec-test-utils.js';

const VENDOR_ID = '12345678-1234-5678-1234-56789abcdef0';

// ─── Loading ────────────────────────────────────────────────────────────────

describe('CharacteristicRegistry loading', () => {
  it('loads on first lookup, once', () => {
    const { registry, source } = createTestRegistry();
    expect(registry.state).toBe('uninitialized');
    expect(source.loadCount).toBe(0);

    registry.resolve('2A19');
    registry.resolve('2A6E');
    registry.list();

    expect(registry.state).toBe('loaded');
    expect(source.loadCount).toBe(1);
  });

  it('shares one in-flight async load between callers', async () => {
    const { registry, source } = createTestRegistry();
    const first = registry.preload();
    expect(registry.state).toBe('loading');
    await Promise.all([first, registry.preload()]);
    expect(source.loadCount).toBe(1);
    expect(registry.state).toBe('loaded');

    await registry.preload();
    expect(source.loadCount).toBe(1);
  });

  it('discards a late async result when a sync load got there first', async () => {
    const { registry, source } = createTestRegistry();
    const pending = registry.preload();
    const countBefore = registry.list().length;
    await pending;
    expect(source.loadCount).toBe(2);
    expect(registry.list()).toHaveLength(countBefore);
  });

  it('warns and continues with built-ins when the data file is missing', () => {
    const logger = createMockLogger();
    const registry = new CharacteristicRegistry({
      source: new YamlSpecSource('/nonexistent/characteristic_uuids.yaml'),
      logger,
    });

    const info = registry.resolve('2A19');
    expect(logger.warn).toHaveBeenCalledWith(
      expect.stringContaining('Specification data unavailable (/nonexistent/characteristic_uuids.yaml)'),
    );
    expect(info?.name).toBe('Battery Level');
    expect(info?.unit).toBe('');
    expect(registry.supports('Battery Level')).toBe(true);
  });

  it('warns when an async load fails', async () => {
    const logger = createMockLogger();
    const failing: SpecSource = {
      description: 'broken',
      load: () => {
        throw new Error('disk on fire');
      },
      loadAsync: () => Promise.reject(new Error('disk on fire')),
    };
    const registry = new CharacteristicRegistry({ source: failing, logger });
    await registry.preload();
    expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('broken): disk on fire'));
    expect(registry.state).toBe('loaded');
  });

  it('warns about invalid entries and keeps the rest', () => {
    const { registry, logger } = createTestRegistry([...TEST_ENTRIES, { uuid: 'nope', name: 'Broken', id: 'x' }]);
    expect(registry.resolve('Elevation')).toBeDefined();
    expect(logger.warn).toHaveBeenCalledWith(
      'Skipping invalid spec entry characteristics[6]: uuid: Must be a 16-, 32- or 128-bit identifier',
    );
  });

  it('rejects re-entrant access from inside a load', () => {
    const logger = createMockLogger();
    const holder: { registry?: CharacteristicRegistry } = {};
    const reentrant: SpecSource = {
      description: 're-entrant',
      load: (): SpecData => {
        holder.registry?.resolve('2A19');
        return { entries: [], skipped: [] };
      },
      loadAsync: () => Promise.resolve({ entries: [], skipped: [] }),
    };
    const registry = new CharacteristicRegistry({ source: reentrant, logger });
    holder.registry = registry;

    registry.ensureLoaded();
    expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('accessed re-entrantly while loading'));
    expect(registry.state).toBe('loaded');
  });
});

// ─── Lookup ─────────────────────────────────────────────────────────────────

describe('CharacteristicRegistry lookup', () => {
  it('resolves every identifier spelling and alias to the same entry', () => {
    const { registry } = createTestRegistry();
    const expected = registry.resolve('2A19');
    expect(expected?.name).toBe('Battery Level');
    expect(expected?.unit).toBe('%');

    for (const input of [
      0x2a19,
      '0x2a19',
      '00002a19-0000-1000-8000-00805f9b34fb',
      'Battery Level',
      'battery_level',
      'BATTERY-LEVEL',
      'org.bluetooth.characteristic.battery_level',
    ]) {
      expect(registry.resolve(input)).toBe(expected);
    }
  });

  it('returns undefined for unknown input', () => {
    const { registry } = createTestRegistry();
    expect(registry.resolve('Flux Capacitor')).toBeUndefined();
    expect(registry.resolve('FFF9')).toBeUndefined();
    expect(registry.resolveClass('FFF9')).toBeUndefined();
    expect(registry.create('FFF9')).toBeUndefined();
  });

  it('knows metadata without a decoder', () => {
    const { registry } = createTestRegistry();
    expect(registry.resolve('Elevation')?.uuid.shortForm).toBe('2a6c');
    expect(registry.supports('Elevation')).toBe(false);
    expect(registry.create('Elevation')).toBeUndefined();
  });

  it('synthesizes metadata for built-ins missing from the registry data', () => {
    const { registry, logger } = createTestRegistry();
    const info = registry.resolve('2A00');
    expect(info).toMatchObject({
      name: 'Device Name',
      id: 'org.bluetooth.characteristic.device_name',
      unit: '',
      valueType: 'unknown',
    });
    expect(registry.resolve('device_name')).toBe(info);
    expect(logger.debug).toHaveBeenCalledWith("No spec entry for built-in 'Device Name', using its own metadata");
  });

  it('creates characteristic instances', () => {
    const { registry } = createTestRegistry();
    const battery = registry.create('battery level');
    expect(battery).toBeInstanceOf(BatteryLevelCharacteristic);
    expect(battery?.name).toBe('Battery Level');
  });

  it('lists entries and supported entries', () => {
    const { registry } = createTestRegistry();
    // 15 built-ins plus Elevation
    expect(registry.list()).toHaveLength(BUILTIN_CHARACTERISTICS.length + 1);
    expect(registry.listSupported()).toHaveLength(BUILTIN_CHARACTERISTICS.length);
  });
});

// ─── Custom registration ────────────────────────────────────────────────────

describe('CharacteristicRegistry custom registration', () => {
  it('refuses to shadow a spec entry without override', () => {
    const { registry } = createTestRegistry();
    const result = registry.registerCustom('2A19', RawBytesCharacteristic, { name: 'My Battery' });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.kind).toBe('Collision');
    expect(registry.resolve('2A19')?.name).toBe('Battery Level');
  });

  it('overrides with override: true and restores on unregister', () => {
    const { registry } = createTestRegistry();
    const result = registry.registerCustom(
      '2A19',
      RawBytesCharacteristic,
      { name: 'My Battery', unit: 'mV', valueType: 'bytes' },
      { override: true },
    );
    expect(result.success).toBe(true);
    expect(registry.resolve('2A19')).toMatchObject({ name: 'My Battery', unit: 'mV', valueType: 'bytes' });
    expect(registry.resolve('my battery')?.uuid.shortForm).toBe('2a19');
    expect(registry.create('2A19')).toBeInstanceOf(RawBytesCharacteristic);

    expect(registry.unregisterCustom('2A19')).toBe(true);
    expect(registry.resolve('2A19')?.name).toBe('Battery Level');
    expect(registry.resolve('my battery')).toBeUndefined();
    expect(registry.create('2A19')).toBeInstanceOf(BatteryLevelCharacteristic);
    expect(registry.unregisterCustom('2A19')).toBe(false);
  });

  it('registers a vendor identifier without override', () => {
    const { registry } = createTestRegistry();
    const result = registry.registerCustom(VENDOR_ID, RawBytesCharacteristic, { name: 'Vendor Blob' });
    expect(result.success).toBe(true);
    expect(registry.resolve('Vendor Blob')?.id).toBe('org.bluetooth.characteristic.vendor_blob');
    expect(registry.supports(VENDOR_ID)).toBe(true);
    expect(registry.listSupported().map((i) => i.name)).toContain('Vendor Blob');
  });

  it('collides with an earlier custom entry unless overridden', () => {
    const { registry } = createTestRegistry();
    registry.registerCustom(VENDOR_ID, RawBytesCharacteristic, { name: 'Vendor Blob' });
    const again = registry.registerCustom(VENDOR_ID, RawBytesCharacteristic, { name: 'Other Blob' });
    expect(again.success).toBe(false);

    const replaced = registry.registerCustom(
      VENDOR_ID,
      RawBytesCharacteristic,
      { name: 'Other Blob' },
      { override: true },
    );
    expect(replaced.success).toBe(true);
    expect(registry.resolve('Vendor Blob')).toBeUndefined();
    expect(registry.resolve('Other Blob')?.name).toBe('Other Blob');
  });

  it('leaves spec aliases alone when a custom name collides with them', () => {
    const { registry, logger } = createTestRegistry();
    const battery = registry.resolve('2A19');
    const result = registry.registerCustom('FFF1', RawBytesCharacteristic, { name: 'Battery Level' });
    expect(result.success).toBe(true);

    expect(registry.resolve('Battery Level')).toBe(battery);
    expect(registry.resolve('org.bluetooth.characteristic.battery_level')).toBe(battery);
    expect(registry.resolve('FFF1')?.name).toBe('Battery Level');
    expect(logger.debug).toHaveBeenCalledWith(
      "Alias 'battery level' already points at 00002a1900001000800000805f9b34fb, ignoring for fff1",
    );
  });

  it('keeps a shared custom alias with the entry that claimed it first', () => {
    const { registry } = createTestRegistry();
    registry.registerCustom('FFF1', RawBytesCharacteristic, { name: 'Vendor Blob' });
    registry.registerCustom('FFF2', RawBytesCharacteristic, { name: 'Vendor Blob' });
    expect(registry.resolve('Vendor Blob')?.uuid.shortForm).toBe('fff1');

    registry.unregisterCustom('FFF2');
    expect(registry.resolve('Vendor Blob')?.uuid.shortForm).toBe('fff1');
  });

  it('hands a shared custom alias to the remaining entry on unregister', () => {
    const { registry } = createTestRegistry();
    registry.registerCustom('FFF1', RawBytesCharacteristic, { name: 'Vendor Blob' });
    registry.registerCustom('FFF2', RawBytesCharacteristic, { name: 'Vendor Blob' });

    registry.unregisterCustom('FFF1');
    expect(registry.resolve('Vendor Blob')?.uuid.shortForm).toBe('fff2');
    registry.unregisterCustom('FFF2');
    expect(registry.resolve('Vendor Blob')).toBeUndefined();
  });

  it('resolves a name that is also valid hex through its alias', () => {
    const { registry } = createTestRegistry();
    registry.registerCustom('FFF3', RawBytesCharacteristic, { name: 'Cafe' });
    expect(registry.resolve('Cafe')?.uuid.shortForm).toBe('fff3');
    expect(registry.resolve('CAFE')?.uuid.shortForm).toBe('fff3');
    expect(registry.resolve(0xcafe)).toBeUndefined();
    expect(registry.resolve('2A19')?.name).toBe('Battery Level');
  });

  it('rejects a malformed identifier', () => {
    const { registry } = createTestRegistry();
    const result = registry.registerCustom('not-hex', RawBytesCharacteristic, { name: 'X' });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.kind).toBe('UUIDResolution');
  });
});

// ─── Default registry ───────────────────────────────────────────────────────

describe('getDefaultRegistry()', () => {
  afterEach(() => {
    _resetDefaultRegistry();
  });

  it('is a lazily created singleton over the bundled data', () => {
    const registry = getDefaultRegistry();
    expect(getDefaultRegistry()).toBe(registry);
    expect(registry.resolve('Humidity')?.unit).toBe('%');

    _resetDefaultRegistry();
    expect(getDefaultRegistry()).not.toBe(registry);
  });

  it('uses an in-memory source when given one', () => {
    const registry = new CharacteristicRegistry({ source: new StaticSpecSource([]), logger: createMockLogger() });
    expect(registry.list()).toHaveLength(BUILTIN_CHARACTERISTICS.length);
  });
});
