import { z } from 'zod';

// --- Schema ---

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export const CodecConfigSchema = z.object({
  spec_path: z.string().min(1, 'Must be a file path').optional(),
  units_path: z.string().min(1, 'Must be a file path').optional(),
  trace: z.boolean().default(false),
  log_level: z.enum(LOG_LEVEL_NAMES).default('info'),
});

// --- Inferred types ---

export type CodecConfig = z.infer<typeof CodecConfigSchema>;

// --- Error formatting ---

export function formatConfigError(error: z.ZodError, source = 'environment'): string {
  const lines = [`Configuration error in ${source}:`, ''];

  for (const issue of error.issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    lines.push(`  ${path}`);
    lines.push(`    ${issue.message}`);
    lines.push('');
  }

  lines.push('See .env.example for the supported settings.');

  return lines.join('\n');
}
