/**
 * Deferred update scopes - batch propagation over a dynamic extent.
 */

import {
  flush,
  isDeferring,
  isScopeOpen,
  popScope,
  pushScope,
} from "./context.js";

/**
 * A marker on the deferred-scope stack.
 *
 * While any scope is open, writes only mark dependents dirty. When the
 * outermost scope exits, every dirty signal function still alive is
 * recomputed, whether or not anything read it.
 */
export class DeferredScope {
  private constructor() {}

  /** Open a new scope, nested in any scope already open. */
  static enter(): DeferredScope {
    const scope = new DeferredScope();
    pushScope(scope);
    return scope;
  }

  get open(): boolean {
    return isScopeOpen(this);
  }

  /**
   * Close this scope and every scope entered after it that is still open.
   * Flushes when it is the outermost one.
   *
   * Throws DeferredScopeError, without closing anything, when this scope is
   * already closed.
   */
  exit(): void {
    if (popScope(this)) flush();
  }
}

/** Open a deferred scope. Pair with `exitDeferredScope`. */
export const enterDeferredScope = (): DeferredScope => DeferredScope.enter();

/** Close a scope returned by `enterDeferredScope`. */
export const exitDeferredScope = (scope: DeferredScope): void => scope.exit();

/** Check if a deferred scope is open */
export const inDeferredScope = (): boolean => isDeferring();

/**
 * Run `fn` inside a deferred scope.
 *
 * Dependents of the signals written by `fn` are recomputed once, when the
 * outermost scope exits, instead of after every write. The scope exits even
 * when `fn` throws, closing any scope `fn` entered and left open, so no dirty
 * value outlives the outermost scope.
 *
 * @example
 * deferred(() => {
 *   first.value = "Ada";
 *   last.value = "Lovelace";
 * }); // fullName recomputes once, here
 */
export function deferred<T>(fn: () => T): T {
  const scope = DeferredScope.enter();
  let result: T;
  try {
    result = fn();
  } catch (error) {
    try {
      scope.exit();
    } catch (flushError) {
      console.warn(
        "[deferred] Flush failed after scope body threw:",
        flushError,
      );
    }
    throw error;
  }
  scope.exit();
  return result;
}
