import { convertFragment } from '../symbols/convert';
import type { ConvertedRegion, RegionKind } from './types';

export type RegionConversion = Omit<ConvertedRegion, 'kind' | 'source'>;

export interface RegionRule {
  kind: RegionKind;
  pattern: RegExp;
  convert: (match: RegExpMatchArray) => RegionConversion;
}

const QUOTE_TAGS = /<\/?(?:blockquote|pre)>/g;
const ROW_BREAK = ' \\\\\n';
const SCRIPT_SPAN = '<(sub|sup)>[\\s\\S]*?</\\1>';

function span(className: string): RegExp {
  return new RegExp(`<span class="${className}">([\\s\\S]*?)</span>`, 'g');
}

function stripQuotes(inner: string): string {
  return inner.replace(QUOTE_TAGS, '');
}

function toMath(inner: string, displayMode: boolean): RegionConversion {
  const latex = convertFragment(stripQuotes(inner).trim());
  return {
    latex,
    output: displayMode ? `\\[${latex}\\]` : `\\(${latex}\\)`,
    displayMode,
  };
}

/** Mark each `relation` outside <sub>/<sup> spans, so bounds like i=1 keep their = */
function markRelation(text: string, relation: string, aligned: string): string {
  const pattern = new RegExp(`${SCRIPT_SPAN}|${relation}`, 'g');
  return text.replace(pattern, (match: string) => (match.startsWith('<') ? match : aligned));
}

/**
 * Build an align* environment. `relation` is the pattern source of the relation that
 * gets the alignment point; every line of the block becomes one row.
 */
function toAligned(inner: string, relation: string, aligned: string): RegionConversion {
  const rows = markRelation(stripQuotes(inner), relation, aligned).trim().replace(/\n/g, ROW_BREAK);
  const latex = `\\begin{align*}\n${convertFragment(rows)}\n\\end{align*}`;
  return { latex, output: latex, displayMode: true };
}

/** Split a literal payload into its LaTeX body and display mode */
function unwrapDelimiters(payload: string): { latex: string; displayMode: boolean } {
  const inline = payload.match(/^\\\(([\s\S]*)\\\)$/);
  if (inline) {
    return { latex: inline[1].trim(), displayMode: false };
  }
  const display = payload.match(/^\\\[([\s\S]*)\\\]$/) ?? payload.match(/^\$\$([\s\S]*)\$\$$/);
  if (display) {
    return { latex: display[1].trim(), displayMode: true };
  }
  return { latex: payload, displayMode: false };
}

/**
 * Region rules in application order. Each pass rescans the document produced by the
 * previous one. Literal blocks run last; their trailing comment never matches a span rule.
 */
export const REGION_RULES: readonly RegionRule[] = [
  {
    kind: 'inline',
    pattern: span('latex-inline'),
    convert: (match) => toMath(match[1], false),
  },
  {
    kind: 'display',
    pattern: span('latex-display'),
    convert: (match) => toMath(match[1], true),
  },
  {
    kind: 'eq-aligned',
    pattern: span('latex-eq-align(?:ed)?'),
    convert: (match) => toAligned(match[1], '=', '&='),
  },
  {
    kind: 'impl-aligned',
    pattern: span('latex-impl-aligned'),
    convert: (match) => toAligned(match[1], '&Implies;', '&\\implies '),
  },
  {
    kind: 'literal',
    // The span body may not run past its own </span>, otherwise a replaceable span
    // without a directive would swallow everything up to the next one that has one.
    pattern:
      /<span class="latex-replace(?:able)?">(?:(?!<\/span>)[\s\S])*<\/span>\s*<!--\s*LATEX:\s*(?:\{@literal\s+([\s\S]*?)\}|([\s\S]*?))\s*-->/g,
    convert: (match) => {
      const wrapped = match[1];
      const payload = wrapped ?? match[2] ?? '';
      return {
        ...unwrapDelimiters(payload),
        output: payload,
        verbatim: wrapped !== undefined,
      };
    },
  },
];
