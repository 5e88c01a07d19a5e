/**
 * Represents a (row, col) coordinate within a grid.
 */
export class Coordinate {
  constructor(
    public readonly row: number,
    public readonly col: number
  ) {}

  /**
   * Create a string key for use in Sets or Maps.
   */
  toKey(): string {
    return `${this.row},${this.col}`;
  }

  /**
   * Check equality with another coordinate.
   */
  equals(other: Coordinate): boolean {
    return this.row === other.row && this.col === other.col;
  }

  toString(): string {
    return `(${this.row},${this.col})`;
  }
}
