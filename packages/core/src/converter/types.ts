export type RegionKind = 'inline' | 'display' | 'eq-aligned' | 'impl-aligned' | 'literal';

export interface ConvertedRegion {
  kind: RegionKind;
  source: string;         // Matched text as found in the document
  latex: string;          // LaTeX without math delimiters
  output: string;         // Text written in place of the source
  displayMode: boolean;   // Whether the LaTeX renders as display math
  verbatim?: boolean;     // Literal payload was wrapped in {@literal ...}
}

/**
 * - injected: the script line was inserted after <head>
 * - present: the document already carries the script line
 * - missing: no <head> element was found
 * - disabled: injection was turned off
 */
export type HeaderStatus = 'injected' | 'present' | 'missing' | 'disabled';

export interface ConversionResult {
  html: string;
  regions: ConvertedRegion[];
  header: HeaderStatus;
  changed: boolean;
}
