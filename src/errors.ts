export class SplayTreeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Node construction failed; the tree keeps its prior contents. */
export class SplayAllocationError extends SplayTreeError {}

/** Copy or move into a destination that still holds records. */
export class SplayTreeStateError extends SplayTreeError {}

/** The top-down engine reached a state its bookkeeping forbids. */
export class SplayInvariantError extends SplayTreeError {}
