/**
 * Hard failures surfaced to callers. Everything else (unparseable labels,
 * unmatched quarters, degenerate crops) is dropped locally.
 */

export class ChartImageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChartImageError';
  }
}

export class DetectionsFormatError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(`${message}: ${issues.join('; ')}`);
    this.name = 'DetectionsFormatError';
    this.issues = issues;
  }
}
