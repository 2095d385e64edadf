import { describe, it, expect } from 'vitest';
import greek from './greek.json';
import { convertFragment } from './convert';
import type { PatternEntry } from './table';

describe('convertFragment', () => {
  it('returns text without recognised markup unchanged', () => {
    expect(convertFragment('x + y = z')).toBe('x + y = z');
    expect(convertFragment('')).toBe('');
  });

  it('turns a subscript pair into a subscript group', () => {
    expect(convertFragment('<sub>X</sub>')).toBe('_{X}');
  });

  it('turns a superscript pair into a superscript group', () => {
    expect(convertFragment('A<sup>H</sup>b')).toBe('A^{H}b');
  });

  it('propagates mismatched script tags token by token', () => {
    expect(convertFragment('a<sub>i<sup>2</sub>')).toBe('a_{i^{2}');
  });

  describe('division', () => {
    it('rewrites a simple two-term division into a fraction', () => {
      expect(convertFragment('(a+b)/(c-d)')).toBe('\\frac{a+b}{c-d}');
    });

    it('allows whitespace around the slash', () => {
      expect(convertFragment('(1) / (n)')).toBe('\\frac{1}{n}');
    });

    it('keeps operands verbatim before later rules rewrite them', () => {
      expect(convertFragment('(&alpha;)/(2)')).toBe('\\frac{\\alpha }{2}');
    });

    it('leaves divisions with markup in an operand as sized delimiters', () => {
      expect(convertFragment('(x<sub>1</sub>)/(2)')).toBe('\\left(x_{1}\\right)/\\left(2\\right)');
    });
  });

  it('escapes braces before anything else', () => {
    expect(convertFragment('{1, 2}')).toBe('\\left\\{ 1, 2\\right\\} ');
  });

  it('sizes parentheses and square brackets', () => {
    expect(convertFragment('f(x) [a, b]')).toBe('f\\left(x\\right) \\left[a, b\\right]');
  });

  it('converts summation and product idioms with bounds', () => {
    expect(convertFragment('&Sigma;<sub>i=1</sub><sup>n</sup> x<sub>i</sub>')).toBe(
      '\\sum_{i=1}^{n} x_{i}'
    );
    expect(convertFragment('&Pi;<sub>k=0</sub><sup>m</sup> a')).toBe('\\prod_{k=0}^{m} a');
  });

  it('keeps a bare capital sigma as a letter', () => {
    expect(convertFragment('U&Sigma;V<sup>T</sup>')).toBe('U\\Sigma V^{T}');
  });

  describe('greek letters', () => {
    it('maps every lowercase and uppercase letter one to one', () => {
      for (const [name, command] of Object.entries(greek)) {
        expect(convertFragment(`&${name};`)).toBe(command);
      }
    });

    it('distinguishes case', () => {
      expect(convertFragment('&sigma; &Sigma;')).toBe('\\sigma  \\Sigma ');
    });

    it('is idempotent once entities are converted', () => {
      const once = convertFragment('&alpha; + &beta; &theta; &Omega;');
      expect(once).toBe('\\alpha  + \\beta  \\theta  \\Omega ');
      expect(convertFragment(once)).toBe(once);
    });
  });

  it('converts bold tags in both spellings', () => {
    expect(convertFragment('<b>v</b> + <strong>w</strong>')).toBe('\\mathbf{v} + \\mathbf{w}');
  });

  it('converts number sets given as glyphs or entities', () => {
    expect(convertFragment('<b>v</b> &isin; ℝ<sup>n</sup>')).toBe('\\mathbf{v} \\in  \\mathbb{R}^{n}');
    expect(convertFragment('&Copf; ℚ ℤ &naturals;')).toBe(
      '\\mathbb{C} \\mathbb{Q} \\mathbb{Z} \\mathbb{N}'
    );
  });

  it('converts relational and operator entities', () => {
    expect(convertFragment('a &lt; b &le; c &ne; d')).toBe('a \\lt  b \\leq  c \\neq  d');
    expect(convertFragment('m&times;n')).toBe('m\\times n');
    expect(convertFragment('&Implies; x')).toBe('\\implies  x');
  });

  it('captures the radicand of a square root', () => {
    expect(convertFragment('&radic;(2)')).toBe('\\sqrt{2}');
  });

  it('keeps a parenthesised group inside the radicand', () => {
    expect(convertFragment('&radic;(x<sup>2</sup> + (y - 1)<sup>2</sup>)')).toBe(
      '\\sqrt{x^{2} + \\left(y - 1\\right)^{2}}'
    );
  });

  it('leaves a radical with deeper nesting as balanced delimiters', () => {
    expect(convertFragment('&radic;(a(b(c)))')).toBe(
      '&radic;\\left(a\\left(b\\left(c\\right)\\right)\\right)'
    );
  });

  it('converts infinity, ellipsis and ell', () => {
    expect(convertFragment('1, 2, ..., &infin;')).toBe('1, 2, \\dots , \\infty ');
    expect(convertFragment('&ell;<sup>p</sup>')).toBe('\\ell ^{p}');
  });

  it('applies a custom table in declaration order', () => {
    const table: PatternEntry[] = [
      [/a/g, 'b'],
      [/b/g, 'c'],
    ];
    expect(convertFragment('ab', table)).toBe('cc');
  });
});
