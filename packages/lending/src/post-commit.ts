/**
 * Post-commit failures.
 *
 * Once a transition has committed, its result stands. Work that follows
 * the commit (loan observers, event appends, event subscribers) can still
 * fail; such errors are handed to a reporter and never reach the caller
 * of the transition.
 */

/** An error raised after the operation it belongs to had committed. */
export interface PostCommitFailure {
  /** Operation or event type that was being reported on */
  readonly operation: string;
  /** Loan key or event stream */
  readonly key: string;
  readonly error: unknown;
}

export type PostCommitErrorHandler = (failure: PostCommitFailure) => void;

/**
 * Routes post-commit failures to a handler, or keeps them for inspection
 * when no handler is configured.
 */
export class PostCommitReporter {
  private readonly _handler: PostCommitErrorHandler | undefined;
  private readonly _retained: PostCommitFailure[] = [];

  constructor(handler?: PostCommitErrorHandler) {
    this._handler = handler;
  }

  /**
   * Run `effect`. An error it throws is reported, not rethrown.
   */
  guard(operation: string, key: string, effect: () => void): void {
    try {
      effect();
    } catch (error) {
      this.report({ operation, key, error });
    }
  }

  report(failure: PostCommitFailure): void {
    if (this._handler === undefined) {
      this._retained.push(failure);
      return;
    }
    try {
      this._handler(failure);
    } catch (error) {
      // Kept alongside the original failure; never rethrown.
      this._retained.push(failure, { operation: "report", key: failure.key, error });
    }
  }

  /** Failures kept because no handler was set, or because the handler threw. */
  failures(): readonly PostCommitFailure[] {
    return [...this._retained];
  }
}
