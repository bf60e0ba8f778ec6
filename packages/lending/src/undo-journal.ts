/**
 * Undo journal.
 *
 * Each mutation of a transition records its inverse. If a later step
 * throws, the inverses run newest-first and the original error propagates,
 * so no transition is ever partially applied.
 */

export class UndoJournal {
  private readonly _steps: (() => void)[] = [];

  record(undo: () => void): void {
    this._steps.push(undo);
  }

  rollback(): void {
    for (let step = this._steps.pop(); step !== undefined; step = this._steps.pop()) {
      step();
    }
  }

  get size(): number {
    return this._steps.length;
  }
}

/**
 * Run `body` with a fresh journal, rolling back everything it recorded
 * if it throws.
 */
export function atomically<T>(body: (journal: UndoJournal) => T): T {
  const journal = new UndoJournal();
  try {
    return body(journal);
  } catch (err) {
    journal.rollback();
    throw err;
  }
}
