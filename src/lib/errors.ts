export class RankerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad or missing input, raised before any model work begins. */
export class InputValidationError extends RankerError {}

/** One file could not be turned into text; it is left out of the ranking. */
export class ExtractionFailure extends RankerError {
  constructor(
    readonly filename: string,
    readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`${filename}: ${reason}`, options);
  }
}

export type TaggingPass = 'section' | 'full-text';

export class TaggingFailure extends RankerError {
  constructor(
    readonly pass: TaggingPass,
    readonly chunkIndex: number,
    options?: { cause?: unknown }
  ) {
    super(`Skill tagging failed for ${pass} chunk ${chunkIndex}`, options);
  }
}

/** Fatal to the ranking call: every score depends on the embeddings. */
export class EmbeddingFailure extends RankerError {}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
