import { z } from 'zod';
import { DEFAULT_SCRIPT_TAG } from '../converter/header';
import { ConfigError } from '../errors';

export const DEFAULT_ROOT = 'target/reports/apidocs';

export const ConvertOptionsSchema = z.object({
  scriptTag: z.string().trim().min(1, 'Script tag must not be empty').default(DEFAULT_SCRIPT_TAG),
  injectHeader: z.boolean().default(true),
});

export const CliOptionsSchema = z.object({
  root: z.string().min(1, 'Root directory is required').default(DEFAULT_ROOT),
  scriptTag: ConvertOptionsSchema.shape.scriptTag,
  dryRun: z.boolean().default(false),
  check: z.boolean().default(false),
  quiet: z.boolean().default(false),
});

export type ConvertOptions = z.input<typeof ConvertOptionsSchema>;
export type ResolvedConvertOptions = z.output<typeof ConvertOptionsSchema>;
export type CliOptionsInput = z.input<typeof CliOptionsSchema>;
export type CliOptions = z.output<typeof CliOptionsSchema>;

export function resolveConvertOptions(options: ConvertOptions = {}): ResolvedConvertOptions {
  const result = ConvertOptionsSchema.safeParse(options);
  if (!result.success) {
    throw ConfigError.fromZod(result.error);
  }
  return result.data;
}

export function resolveCliOptions(options: CliOptionsInput): CliOptions {
  const result = CliOptionsSchema.safeParse(options);
  if (!result.success) {
    throw ConfigError.fromZod(result.error);
  }
  return result.data;
}
