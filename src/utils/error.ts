/** Convert an unknown caught value to a human-readable error message. */
export function errMsg(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Format bytes as space-separated uppercase hex pairs (`"0A FF 01"`). */
export function toHex(data: Uint8Array): string {
  return Array.from(data, (b) => b.toString(16).toUpperCase().padStart(2, '0')).join(' ');
}

/**
 * Parse a hex string into a Buffer. Accepts spaces, colons, dashes and an
 * optional `0x` prefix between bytes. Returns null for odd-length or non-hex input.
 */
export function fromHex(text: string): Buffer | null {
  const clean = text.replace(/0x/gi, '').replace(/[\s:-]/g, '');
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) return null;
  return Buffer.from(clean, 'hex');
}
