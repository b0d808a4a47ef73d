import type { ValidationIssue, ValidationResult } from "./types";

/**
 * Accumulates errors and warnings; no check ever short-circuits another.
 */
export class IssueCollector {
  private readonly errors: ValidationIssue[] = [];
  private readonly warnings: ValidationIssue[] = [];

  addError(message: string, componentPath: string): void {
    this.errors.push({ componentPath, message, severity: "error" });
  }

  addWarning(message: string, componentPath: string): void {
    this.warnings.push({ componentPath, message, severity: "warning" });
  }

  merge(result: ValidationResult): void {
    this.errors.push(...result.errors);
    this.warnings.push(...result.warnings);
  }

  get errorCount(): number {
    return this.errors.length;
  }

  toResult(): ValidationResult {
    return {
      valid: this.errors.length === 0,
      errors: [...this.errors],
      warnings: [...this.warnings],
    };
  }
}

/**
 * One line per issue, `path: message`
 */
export function formatIssues(issues: ValidationIssue[]): string[] {
  return issues.map((issue) => `${issue.componentPath}: ${issue.message}`);
}
