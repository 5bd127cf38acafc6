import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, afterEach } from 'vitest';
import { parseBatchText, readBatchFile } from '../../src/cli/batch-file.js';
import { hex } from '../helpers/codec-test-utils.js';

describe('parseBatchText()', () => {
  it('reads a YAML mapping of identifier to hex', () => {
    const text = ['battery_level: "55"', '2A18: "00 01 00 E8 07 03 0F 0A 1E 00"', ''].join('\n');
    expect(parseBatchText(text)).toEqual({
      battery_level: hex('55'),
      '2A18': hex('00 01 00 E8 07 03 0F 0A 1E 00'),
    });
  });

  it('reads JSON', () => {
    expect(parseBatchText('{"2A19": "0x55"}', 'json')).toEqual({ '2A19': hex('55') });
  });

  it('rejects malformed hex', () => {
    expect(() => parseBatchText('battery_level: "5"')).toThrow(
      'Invalid batch file: battery_level: Must be an even number of hex digits',
    );
  });

  it('rejects a non-string payload', () => {
    expect(() => parseBatchText('battery_level: 55')).toThrow(
      'Invalid batch file: battery_level: Expected string, received number',
    );
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseBatchText('- "55"')).toThrow('Invalid batch file: (root)');
  });
});

describe('readBatchFile()', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('picks the parser from the file extension', () => {
    dir = mkdtempSync(join(tmpdir(), 'gatt-batch-'));
    const jsonPath = join(dir, 'readings.json');
    const yamlPath = join(dir, 'readings.yml');
    writeFileSync(jsonPath, '{"Battery Level": "55"}');
    writeFileSync(yamlPath, 'Humidity: "64 09"\n');

    expect(readBatchFile(jsonPath)).toEqual({ 'Battery Level': hex('55') });
    expect(readBatchFile(yamlPath)).toEqual({ Humidity: hex('64 09') });
  });
});
