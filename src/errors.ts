/**
 * Error types raised by the classifier core.
 */

/**
 * Raised when a category name is not one of the fixed content partitions.
 */
export class UnknownCategoryError extends Error {
  override readonly name = 'UnknownCategoryError';

  constructor(readonly category: string) {
    super(`Unknown category: ${category} (expected words, phrases or game_ideas)`);
  }
}

/**
 * Raised when a vector does not match the network's dimensions.
 */
export class DimensionMismatchError extends Error {
  override readonly name = 'DimensionMismatchError';

  constructor(
    readonly what: string,
    readonly expected: number,
    readonly actual: number
  ) {
    super(`${what} dimension mismatch: expected ${expected}, got ${actual}`);
  }
}
