export { convertFragment } from './symbols/convert';
export { SYMBOL_TABLE, type PatternEntry } from './symbols/table';
export { convertDocument } from './converter/document';
export { injectHeader, DEFAULT_SCRIPT_TAG, type HeaderInjection } from './converter/header';
export { REGION_RULES, type RegionRule, type RegionConversion } from './converter/regions';
export type { ConversionResult, ConvertedRegion, HeaderStatus, RegionKind } from './converter/types';
export { KaTeXValidator } from './renderers/katex';
export type { LatexValidator, ValidationResult } from './renderers/base';
export {
  ConvertOptionsSchema,
  CliOptionsSchema,
  DEFAULT_ROOT,
  resolveConvertOptions,
  resolveCliOptions,
  type ConvertOptions,
  type ResolvedConvertOptions,
  type CliOptions,
  type CliOptionsInput,
} from './schemas/options';
export { ConfigError } from './errors';
