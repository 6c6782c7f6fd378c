/**
 * Raised before generation starts when a world config or grid size is unusable.
 * All problems found in one validation pass are collected in `issues`.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid world configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** A grid read outside the generated world. The caller broke a precondition. */
export class OutOfBoundsError extends RangeError {
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number, width: number, height: number) {
    super(`Cell (${x}, ${y}) is outside the ${width}x${height} grid`);
    this.name = 'OutOfBoundsError';
    this.x = x;
    this.y = y;
  }
}
