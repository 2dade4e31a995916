export type Dimension = 'width' | 'height';

/** Thrown before generation starts when a grid dimension is not a positive integer */
export class InvalidDimensionError extends Error {
  readonly dimension: Dimension;
  readonly value: number;

  constructor(dimension: Dimension, value: number) {
    super(`World ${dimension} must be a positive integer (got ${value})`);
    this.name = 'InvalidDimensionError';
    this.dimension = dimension;
    this.value = value;
  }
}

export function assertDimension(dimension: Dimension, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidDimensionError(dimension, value);
  }
}
