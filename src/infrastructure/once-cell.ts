import { ReentrantInitializationError } from '../domain/errors.js';

type CellState<T> =
  | { status: 'empty' }
  | { status: 'initializing' }
  | { status: 'ready'; value: T };

/**
 * A slot written at most once. The first `getOrInit()` runs its initializer
 * and every later call returns the stored value.
 *
 * The initializer runs synchronously, so concurrent async callers cannot
 * observe the `initializing` state; only the initializer itself can, and that
 * is rejected.
 *
 * @example
 * ```typescript
 * const cell = new OnceCell<Database>('db');
 * const db = cell.getOrInit(() => new Database());
 * cell.getOrInit(() => new Database()) === db; // true
 * ```
 */
export class OnceCell<T> {
  private state: CellState<T> = { status: 'empty' };

  constructor(private readonly label = 'cell') {}

  /** Returns the stored value, or `undefined` while the cell is empty. */
  get(): T | undefined {
    return this.state.status === 'ready' ? this.state.value : undefined;
  }

  isInitialized(): boolean {
    return this.state.status === 'ready';
  }

  /**
   * Stores `value` if the cell is empty.
   * @returns `false` when the cell already holds a value or is initializing.
   */
  set(value: T): boolean {
    if (this.state.status !== 'empty') return false;
    this.state = { status: 'ready', value };
    return true;
  }

  /**
   * Returns the stored value, or runs `init` and stores its result.
   * If `init` throws, the cell stays empty and the error propagates.
   *
   * @throws ReentrantInitializationError when `init` reaches this cell again.
   */
  getOrInit(init: () => T): T {
    const current = this.state;
    if (current.status === 'ready') return current.value;
    if (current.status === 'initializing') {
      throw new ReentrantInitializationError(this.label, [
        this.label,
        this.label,
      ]);
    }

    this.state = { status: 'initializing' };
    try {
      const value = init();
      this.state = { status: 'ready', value };
      return value;
    } catch (error) {
      this.state = { status: 'empty' };
      throw error;
    }
  }
}
