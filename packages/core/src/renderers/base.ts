export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export interface LatexValidator {
  validate(latex: string, displayMode?: boolean): ValidationResult;
  getVersion(): string;
}
