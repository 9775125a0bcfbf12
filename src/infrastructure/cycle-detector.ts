import type { ICycleDetector } from '../domain/types.js';

/**
 * Tracks which keys are on the current resolution path.
 * Uses an insertion-ordered Set, so `path()` lists keys outermost first.
 * enter/leave must be balanced (use try/finally).
 */
export class CycleDetector implements ICycleDetector {
  private readonly resolving = new Set<string>();

  enter(key: string): void {
    this.resolving.add(key);
  }

  leave(key: string): void {
    this.resolving.delete(key);
  }

  isResolving(key: string): boolean {
    return this.resolving.has(key);
  }

  path(): string[] {
    return [...this.resolving];
  }
}
