import { resolveConvertOptions, type ConvertOptions } from '../schemas/options';
import { injectHeader } from './header';
import { REGION_RULES, type RegionRule } from './regions';
import type { ConversionResult, ConvertedRegion, HeaderStatus } from './types';

function applyRule(html: string, rule: RegionRule, regions: ConvertedRegion[]): string {
  let result = '';
  let lastIndex = 0;

  for (const match of html.matchAll(rule.pattern)) {
    const start = match.index ?? lastIndex;
    const conversion = rule.convert(match);
    regions.push({ kind: rule.kind, source: match[0], ...conversion });
    result += html.slice(lastIndex, start) + conversion.output;
    lastIndex = start + match[0].length;
  }

  return result + html.slice(lastIndex);
}

/**
 * Convert a whole HTML document: inject the math script after <head>, then run the
 * region passes in order (inline, display, eq-aligned, impl-aligned, literal).
 */
export function convertDocument(html: string, options: ConvertOptions = {}): ConversionResult {
  const { scriptTag, injectHeader: shouldInject } = resolveConvertOptions(options);

  let current = html;
  let header: HeaderStatus = 'disabled';
  if (shouldInject) {
    const injection = injectHeader(current, scriptTag);
    current = injection.html;
    header = injection.status;
  }

  const regions: ConvertedRegion[] = [];
  for (const rule of REGION_RULES) {
    current = applyRule(current, rule, regions);
  }

  return {
    html: current,
    regions,
    header,
    changed: current !== html,
  };
}
