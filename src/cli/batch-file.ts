import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { BatchInput } from '../batch.js';
import { fromHex } from '../utils/error.js';

/**
 * Batch file: a mapping of identifier (or alias) to hex payload.
 *
 *   battery_level: "55"
 *   2A18: "1B 01 00 ..."
 */
const HexPayloadSchema = z
  .string()
  .transform((text, ctx) => {
    const bytes = fromHex(text);
    if (!bytes) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be an even number of hex digits' });
      return z.NEVER;
    }
    return bytes;
  });

export const BatchFileSchema = z.record(z.string(), HexPayloadSchema);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Parse batch file text. JSON when `format` is 'json', YAML otherwise (YAML also reads JSON). */
export function parseBatchText(text: string, format: 'json' | 'yaml' = 'yaml'): BatchInput {
  const doc: unknown = format === 'json' ? JSON.parse(text) : parseYaml(text);
  const result = BatchFileSchema.safeParse(doc);
  if (!result.success) throw new Error(`Invalid batch file: ${formatIssues(result.error)}`);
  return result.data;
}

export function readBatchFile(path: string): BatchInput {
  const format = extname(path).toLowerCase() === '.json' ? 'json' : 'yaml';
  return parseBatchText(readFileSync(path, 'utf8'), format);
}
