/**
 * Error types shared by the renderer and the showcase
 */

/**
 * Thrown by a render surface that refuses to draw a character
 */
export class RenderError extends Error {
  constructor(
    message: string,
    public readonly char: string,
    public readonly x: number,
    public readonly y: number
  ) {
    super(message);
    this.name = 'RenderError';
  }
}

/**
 * Thrown when a surface cannot answer a glyph capability query
 */
export class ProbeUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProbeUnavailableError';
  }
}

export class ShowcaseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShowcaseError';
  }
}
