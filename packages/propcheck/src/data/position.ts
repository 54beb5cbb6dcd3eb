import { basename } from 'path';

/**
 * Call-site position of a property check.
 *
 * Positions are opaque to the check loop; they are only carried through to
 * failure reports so a reader can find the check that failed.
 */
export class SourcePosition {
  constructor(
    public readonly fileName: string,
    public readonly filePathname: string,
    public readonly lineNumber: number
  ) {
    if (!Number.isInteger(lineNumber) || lineNumber < 1) {
      throw new Error(`Line number must be a positive integer, got ${lineNumber}`);
    }
  }

  /**
   * Create a position from a file path, deriving the file name.
   */
  static of(filePathname: string, lineNumber: number): SourcePosition {
    return new SourcePosition(basename(filePathname), filePathname, lineNumber);
  }

  toString(): string {
    return `${this.fileName}:${this.lineNumber}`;
  }
}

/**
 * Anything that can report where it was raised.
 */
export interface HasPosition {
  readonly position?: SourcePosition;
}

/**
 * Find the position carried by a thrown value, if it carries one.
 */
export function positionOf(value: unknown): SourcePosition | undefined {
  if (typeof value === 'object' && value !== null && 'position' in value) {
    const { position } = value;
    return position instanceof SourcePosition ? position : undefined;
  }
  return undefined;
}
