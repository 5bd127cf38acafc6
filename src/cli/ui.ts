import chalk from 'chalk';
import type { CharacteristicInfo, DecodedResult } from '../interfaces/characteristic.js';
import { toHex } from '../utils/error.js';

export function success(msg: string): string {
  return chalk.green(`✔  ${msg}`);
}

export function error(msg: string): string {
  return chalk.red(`✘  ${msg}`);
}

export function dim(msg: string): string {
  return chalk.dim(msg);
}

export function divider(): string {
  return chalk.dim('─'.repeat(50));
}

/**
 * JSON rendering of a decoded value. Non-finite numbers print as their names
 * and sets as arrays, since JSON has neither.
 */
export function formatValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  return JSON.stringify(
    value,
    (_key, v: unknown) => {
      if (typeof v === 'number' && !Number.isFinite(v)) return String(v);
      if (v instanceof Set) return [...v];
      return v;
    },
    2,
  );
}

function title(label: string, info: CharacteristicInfo | undefined): string {
  return info ? `${info.name} [${info.uuid.shortForm}]` : label;
}

const indent = (text: string): string =>
  text
    .split('\n')
    .map((line) => `   ${line}`)
    .join('\n');

/** Multi-line, coloured report for one result. `label` is the identifier the caller used. */
export function formatResult(label: string, result: DecodedResult<unknown>): string {
  const lines: string[] = [];

  if (result.success) {
    const unit = result.characteristic.unit ? ` ${dim(`(${result.characteristic.unit})`)}` : '';
    lines.push(success(`${title(label, result.characteristic)}${unit}`));
    lines.push(indent(formatValue(result.value)));
  } else {
    lines.push(error(`${title(label, result.characteristic)}: ${chalk.bold(result.errorKind)}`));
    lines.push(indent(result.message));
    for (const fe of result.fieldErrors) {
      const at = fe.offset === undefined ? '' : ` @${fe.offset}`;
      lines.push(indent(dim(`${fe.field}${at}: ${fe.reason}`)));
    }
    if (result.partial && Object.keys(result.partial).length > 0) {
      lines.push(indent(dim(`partial: ${formatValue(result.partial)}`)));
    }
  }

  lines.push(indent(dim(`raw: ${toHex(result.raw) || '(empty)'}`)));
  for (const step of result.trace) lines.push(indent(dim(`· ${step}`)));
  return lines.join('\n');
}
