export type DecodeCommand =
  | { kind: 'help' }
  | { kind: 'list' }
  | { kind: 'single'; id: string; hex: string }
  | { kind: 'batch'; file: string };

export interface DecodeArgs {
  readonly command: DecodeCommand;
  /** Undefined when neither --trace nor --no-trace was given. */
  readonly trace?: boolean;
}

export const USAGE = `
gatt-decode: decode Bluetooth GATT characteristic payloads

Usage:
  gatt-decode <identifier> <hex>      Decode one payload
  gatt-decode --batch <file>          Decode a YAML/JSON map of identifier -> hex
  gatt-decode --list                  List characteristics with a decoder
  gatt-decode --help                  Show this help

Options:
  --trace / --no-trace                Include the step-by-step parse trace

Identifiers may be 16-bit ("2A19", "0x2a19"), 128-bit, a name
("Battery Level") or a spec id ("org.bluetooth.characteristic.battery_level").
`;

/** Throws an Error with a one-line message on bad usage. */
export function parseDecodeArgs(args: readonly string[]): DecodeArgs {
  let trace: boolean | undefined;
  let batchFile: string | undefined;
  let list = false;
  let help = false;
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      help = true;
    } else if (arg === '--list') {
      list = true;
    } else if (arg === '--trace') {
      trace = true;
    } else if (arg === '--no-trace') {
      trace = false;
    } else if (arg === '--batch') {
      if (i + 1 >= args.length) throw new Error('--batch needs a file path');
      batchFile = args[++i];
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (help) return { command: { kind: 'help' }, trace };
  if (list) return { command: { kind: 'list' }, trace };
  if (batchFile !== undefined) {
    if (positional.length > 0) throw new Error('--batch does not take positional arguments');
    return { command: { kind: 'batch', file: batchFile }, trace };
  }
  if (positional.length < 2) throw new Error('Expected <identifier> <hex>');

  // Allow the payload to be split across arguments: `2A19 0A FF`.
  const [id, ...hex] = positional;
  return { command: { kind: 'single', id, hex: hex.join(' ') }, trace };
}
