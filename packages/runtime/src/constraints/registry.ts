// Checker registry - maps constraint kinds to checkers

import { builtinCheckers, type ConstraintChecker } from './checkers/index.js';

/**
 * Registry for constraint checkers.
 * Maps constraint kind strings to checker functions.
 *
 * Kinds without a checker are evaluated as "inapplicable" by the evaluator,
 * so new constraint kinds introduced upstream degrade instead of failing.
 */
export class CheckerRegistry {
  private checkers = new Map<string, ConstraintChecker>();

  /**
   * Register a checker for a constraint kind.
   *
   * @throws Error if a checker is already registered (use forceRegister to override)
   */
  register(kind: string, checker: ConstraintChecker): void {
    if (this.checkers.has(kind)) {
      throw new Error(`Checker already registered for kind: ${kind}`);
    }
    this.checkers.set(kind, checker);
  }

  /**
   * Register a checker, overwriting any existing one.
   * Use with caution - primarily for testing.
   */
  forceRegister(kind: string, checker: ConstraintChecker): void {
    this.checkers.set(kind, checker);
  }

  /**
   * @returns true if a checker was removed, false if none existed
   */
  unregister(kind: string): boolean {
    return this.checkers.delete(kind);
  }

  get(kind: string): ConstraintChecker | undefined {
    return this.checkers.get(kind);
  }

  has(kind: string): boolean {
    return this.checkers.has(kind);
  }

  getRegisteredKinds(): string[] {
    return Array.from(this.checkers.keys());
  }

  /**
   * Clear all checkers. Primarily for testing.
   */
  clear(): void {
    this.checkers.clear();
  }
}

/**
 * Create a registry with all built-in checkers registered
 */
export function createCheckerRegistry(): CheckerRegistry {
  const registry = new CheckerRegistry();
  for (const [kind, checker] of Object.entries(builtinCheckers)) {
    registry.register(kind, checker);
  }
  return registry;
}
