import { describe, it, expect } from 'vitest';
import { parseDecodeArgs, USAGE } from '../../src/cli/args.js';

describe('parseDecodeArgs()', () => {
  it('parses an identifier and payload', () => {
    expect(parseDecodeArgs(['2A19', '55'])).toEqual({ command: { kind: 'single', id: '2A19', hex: '55' } });
  });

  it('joins a payload split across arguments', () => {
    expect(parseDecodeArgs(['Heart Rate Measurement', '06', '48', '--trace'])).toEqual({
      command: { kind: 'single', id: 'Heart Rate Measurement', hex: '06 48' },
      trace: true,
    });
  });

  it('parses --batch with --no-trace', () => {
    expect(parseDecodeArgs(['--batch', 'readings.yaml', '--no-trace'])).toEqual({
      command: { kind: 'batch', file: 'readings.yaml' },
      trace: false,
    });
  });

  it('gives --help and --list precedence', () => {
    expect(parseDecodeArgs(['-h', '2A19']).command).toEqual({ kind: 'help' });
    expect(parseDecodeArgs(['--list']).command).toEqual({ kind: 'list' });
    expect(parseDecodeArgs(['--list', '--help']).command).toEqual({ kind: 'help' });
  });

  it('rejects bad usage', () => {
    expect(() => parseDecodeArgs([])).toThrow('Expected <identifier> <hex>');
    expect(() => parseDecodeArgs(['2A19'])).toThrow('Expected <identifier> <hex>');
    expect(() => parseDecodeArgs(['--batch'])).toThrow('--batch needs a file path');
    expect(() => parseDecodeArgs(['--batch', 'readings.yaml', '2A19'])).toThrow(
      '--batch does not take positional arguments',
    );
    expect(() => parseDecodeArgs(['--verbose'])).toThrow('Unknown option: --verbose');
  });

  it('documents every command in the usage text', () => {
    for (const usage of ['<identifier> <hex>', '--batch <file>', '--list', '--help', '--trace']) {
      expect(USAGE).toContain(usage);
    }
  });
});
