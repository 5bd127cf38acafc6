import type { CharacteristicInfo } from '../interfaces/characteristic.js';

/**
 * Canonical spelling for alias keys: lowercase, with runs of spaces,
 * underscores and dashes collapsed to one space. `"Battery Level"`,
 * `"battery_level"` and `"BATTERY-LEVEL"` all become `"battery level"`.
 */
export function normalizeAlias(text: string): string {
  return text.trim().toLowerCase().replace(/[\s_-]+/g, ' ');
}

/**
 * Every alias an entry answers to besides its identifier forms: the display
 * name, the full id string and the id's last segment. Computed once at load.
 */
export function aliasesFor(info: Pick<CharacteristicInfo, 'name' | 'id'>): string[] {
  const keys = new Set<string>();
  keys.add(normalizeAlias(info.name));
  if (info.id) {
    keys.add(normalizeAlias(info.id));
    const tail = info.id.slice(info.id.lastIndexOf('.') + 1);
    if (tail) keys.add(normalizeAlias(tail));
  }
  keys.delete('');
  return [...keys];
}

/** Spec id string derived from a display name (`Battery Level` → `org.bluetooth.characteristic.battery_level`). */
export function idFromName(name: string): string {
  const snake = name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_|_$/g, '');
  return `org.bluetooth.characteristic.${snake}`;
}
