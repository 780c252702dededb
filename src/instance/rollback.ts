export type UndoAction = () => Promise<void>;

/**
 * Undo actions for the resources acquired so far, run newest first when an
 * acquisition sequence fails partway.
 */
export class RollbackStack {
  private actions: UndoAction[] = [];

  push(action: UndoAction): void {
    this.actions.push(action);
  }

  /** Acquire a resource and register how to release it. */
  async acquire<T>(acquire: () => Promise<T>, release: (resource: T) => Promise<void>): Promise<T> {
    const resource = await acquire();
    this.push(() => release(resource));
    return resource;
  }

  get size(): number {
    return this.actions.length;
  }

  /** Forget every undo action; the resources now belong to the caller. */
  commit(): void {
    this.actions = [];
  }

  /**
   * Run every undo action in reverse order. All actions run even if one
   * throws; the errors are returned for the caller to report.
   */
  async unwind(): Promise<unknown[]> {
    const errors: unknown[] = [];
    while (this.actions.length > 0) {
      const action = this.actions.pop();
      if (action === undefined) break;
      try {
        await action();
      } catch (error) {
        errors.push(error);
      }
    }
    return errors;
  }
}
