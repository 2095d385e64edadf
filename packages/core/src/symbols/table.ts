import greek from './greek.json';

/**
 * A global pattern and the replacement template applied to every match.
 * Templates reference captures positionally ($1, $2).
 */
export type PatternEntry = readonly [RegExp, string];

function entity(name: string): RegExp {
  return new RegExp(`&${name};`, 'g');
}

/** Operands of a simple division: no parentheses, brackets or angle brackets */
const OPERAND = '[^()\\[\\]<>]+';

/** Text without a sized delimiter, or one sized group that contains none itself */
const SIZED_CHAR = '(?:(?!\\\\left\\(|\\\\right\\))[\\s\\S])';
const SIZED_GROUP = `\\\\left\\(${SIZED_CHAR}*\\\\right\\)`;
const RADICAND = `(?:${SIZED_GROUP}|${SIZED_CHAR})*`;

export const BRACE_PATTERNS: readonly PatternEntry[] = [
  [/\{/g, '\\left\\{ '],
  [/\}/g, '\\right\\} '],
];

export const DIVISION_PATTERNS: readonly PatternEntry[] = [
  [new RegExp(`\\((${OPERAND})\\)\\s*/\\s*\\((${OPERAND})\\)`, 'g'), '\\frac{$1}{$2}'],
];

export const DELIMITER_PATTERNS: readonly PatternEntry[] = [
  [/\(/g, '\\left('],
  [/\)/g, '\\right)'],
  [/\[/g, '\\left['],
  [/\]/g, '\\right]'],
];

export const BIG_OPERATOR_PATTERNS: readonly PatternEntry[] = [
  [/&Sigma;<sub>([\s\S]*?)<\/sub><sup>([\s\S]*?)<\/sup>/g, '\\sum_{$1}^{$2}'],
  [/&Pi;<sub>([\s\S]*?)<\/sub><sup>([\s\S]*?)<\/sup>/g, '\\prod_{$1}^{$2}'],
];

export const GREEK_PATTERNS: readonly PatternEntry[] = Object.entries(greek).map(
  ([name, command]): PatternEntry => [entity(name), command]
);

export const SCRIPT_PATTERNS: readonly PatternEntry[] = [
  [/<sub>/g, '_{'],
  [/<\/sub>/g, '}'],
  [/<sup>/g, '^{'],
  [/<\/sup>/g, '}'],
];

export const BOLD_PATTERNS: readonly PatternEntry[] = [
  [/<b>([\s\S]*?)<\/b>/g, '\\mathbf{$1}'],
  [/<strong>([\s\S]*?)<\/strong>/g, '\\mathbf{$1}'],
];

export const NUMBER_SET_PATTERNS: readonly PatternEntry[] = [
  [/ℝ|&reals;|&Ropf;/g, '\\mathbb{R}'],
  [/ℚ|&rationals;|&Qopf;/g, '\\mathbb{Q}'],
  [/ℂ|&complexes;|&Copf;/g, '\\mathbb{C}'],
  [/ℤ|&integers;|&Zopf;/g, '\\mathbb{Z}'],
  [/ℕ|&naturals;|&Nopf;/g, '\\mathbb{N}'],
];

export const OPERATOR_PATTERNS: readonly PatternEntry[] = [
  [entity('lt'), '\\lt '],
  [entity('gt'), '\\gt '],
  [entity('le'), '\\leq '],
  [entity('ge'), '\\geq '],
  [entity('ne'), '\\neq '],
  [entity('plusmn'), '\\pm '],
  [entity('isin'), '\\in '],
  [entity('notin'), '\\notin '],
  // parentheses are already sized by the time the radicand is captured; deeper nesting
  // than one inner group is left as is
  [new RegExp(`&radic;\\\\left\\((${RADICAND})\\\\right\\)`, 'g'), '\\sqrt{$1}'],
  [entity('asymp'), '\\approx '],
  [entity('oplus'), '\\oplus '],
  [entity('Implies'), '\\implies '],
  [entity('times'), '\\times '],
  [entity('middot'), '\\cdot '],
];

export const MISC_PATTERNS: readonly PatternEntry[] = [
  [entity('infin'), '\\infty '],
  [/\.\.\./g, '\\dots '],
  [entity('hellip'), '\\dots '],
  [entity('ell'), '\\ell '],
];

/**
 * Full rewrite table in application order. Later groups see the output of earlier ones:
 * braces are escaped before divisions introduce \frac{..}{..}, divisions consume their
 * parentheses before the remaining ones are sized, and the big operators claim
 * &Sigma;/&Pi; before the Greek letters do.
 */
export const SYMBOL_TABLE: readonly PatternEntry[] = [
  ...BRACE_PATTERNS,
  ...DIVISION_PATTERNS,
  ...DELIMITER_PATTERNS,
  ...BIG_OPERATOR_PATTERNS,
  ...GREEK_PATTERNS,
  ...SCRIPT_PATTERNS,
  ...BOLD_PATTERNS,
  ...NUMBER_SET_PATTERNS,
  ...OPERATOR_PATTERNS,
  ...MISC_PATTERNS,
];
