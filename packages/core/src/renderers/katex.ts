import katex from 'katex';
import type { LatexValidator, ValidationResult } from './base';

export class KaTeXValidator implements LatexValidator {
  validate(latex: string, displayMode = false): ValidationResult {
    try {
      katex.renderToString(latex, {
        displayMode,
        throwOnError: true,
        output: 'html',
        strict: 'ignore',
      });
      return { valid: true, errors: [] };
    } catch (error) {
      return {
        valid: false,
        errors: [error instanceof Error ? error.message : String(error)],
      };
    }
  }

  getVersion(): string {
    return katex.version;
  }
}
