/**
 * Errors raised while compiling a reduction spec into commands.
 *
 * Selection and precondition errors become warnings when the caller passes
 * `force`; a policy conflict never does.
 */

/**
 * A requested block, calib type or science step does not exist.
 */
export class SelectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SelectionError";
  }
}

/**
 * A directory the commands need is missing.
 */
export class PreconditionError extends Error {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "PreconditionError";
    this.path = path;
  }
}

/**
 * Execution options that must not be combined.
 */
export class PolicyConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PolicyConflictError";
  }
}
