/**
 * Typed error classes for the failures that end a run.
 *
 * Unknown words, mismatched lengths and unreachable pairs are ordinary query
 * results and never surface here.
 */

/** The dictionary could not be opened or read. */
export class WordSourceError extends Error {
  constructor(
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot read word list ${path}`, options);
    this.name = 'WordSourceError';
  }
}

/** The snapshot file could not be read, decoded or written. */
export class GraphStoreError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GraphStoreError';
  }
}

/** A snapshot breaks one of the graph's structural invariants. */
export class SnapshotError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SnapshotError';
  }
}

/**
 * A word was routed to a subgraph of a different length. Indicates a bug in
 * the bucketing code, not bad input.
 */
export class WordLengthMismatchError extends Error {
  constructor(
    readonly word: string,
    readonly expectedLength: number
  ) {
    super(
      `Cannot add "${word}" (length ${word.length}) to the length-${expectedLength} subgraph`
    );
    this.name = 'WordLengthMismatchError';
  }
}

export class InvalidFilterOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFilterOptionsError';
  }
}
