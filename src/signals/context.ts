/**
 * Propagation engine and deferred-scope state for the reactive graph.
 *
 * Edges point from a source to the signal functions that depend on it and
 * are held weakly, so the graph never keeps a dependent alive. When a
 * source changes, every transitive dependent is marked dirty first. What
 * happens next depends on whether a deferred scope is open:
 *
 * - Eager mode: the dirtied nodes are recomputed right away in a single
 *   "wave". Each node recomputes after its dirty dependencies and at most
 *   once per wave, so a diamond never computes its bottom node twice.
 * - Deferred mode: nothing recomputes. Dirty nodes wait in the stale
 *   registry until they are read or the outermost scope exits.
 */

import { DeferredScopeError } from "./errors.js";

/** A signal as seen by the engine: something other nodes can depend on. */
export interface GraphNode {
  /** Live dependents, in registration order. */
  readonly dependents: Dependent[];
  /** @internal */
  addDependent(ref: WeakRef<Dependent>): void;
}

/** A node whose value is derived from other nodes. */
export interface Dependent extends GraphNode {
  readonly dirty: boolean;
  readonly computing: boolean;
  /** Dependencies in declaration order. */
  readonly sources: GraphNode[];
  /** The weak reference sources hold to this node. */
  readonly ref: WeakRef<Dependent>;
  /**
   * Set the dirty flag.
   * @returns false when the node was already dirty
   * @internal
   */
  markDirty(): boolean;
  /** @internal */
  recompute(): void;
}

const isDependent = (node: GraphNode): node is Dependent => "recompute" in node;

// ============================================================================
// Global State
// ============================================================================

/** Open deferred scopes, innermost last */
const scopes: object[] = [];

/** Queue of the wave currently running, if any */
let wave: Dependent[] | null = null;

/** Every node marked dirty and not yet recomputed, in the order it got dirty */
const stale = new Set<WeakRef<Dependent>>();

/** Reusable stack for iterative refresh (avoids allocation per refresh call) */
const evalStack: Dependent[] = [];

// ============================================================================
// Deferred scopes
// ============================================================================

/** Check if a deferred scope is open */
export function isDeferring(): boolean {
  return scopes.length > 0;
}

export function pushScope(marker: object): void {
  scopes.push(marker);
}

/** Check if `marker` is on the scope stack */
export function isScopeOpen(marker: object): boolean {
  return scopes.includes(marker);
}

/**
 * Remove `marker` from the scope stack, along with every scope entered
 * after it that is still open.
 * @returns true when it was the outermost scope
 */
export function popScope(marker: object): boolean {
  const index = scopes.lastIndexOf(marker);
  if (index < 0) throw new DeferredScopeError("deferred scope already exited");
  scopes.length = index;
  return index === 0;
}

// ============================================================================
// Propagation
// ============================================================================

/**
 * Mark every transitive dependent of `source` dirty.
 *
 * The returned queue holds the direct dependents (dirty already or not)
 * followed by every node that this call dirtied. A node that was already
 * dirty is not expanded: its own dependents are dirty too.
 */
function invalidate(source: GraphNode): Dependent[] {
  const queue = source.dependents;
  for (let i = 0; i < queue.length; i++) {
    const node = queue[i]!;
    if (!node.markDirty()) continue;
    stale.add(node.ref);
    for (const target of node.dependents) {
      if (!target.dirty) queue.push(target);
    }
  }
  return queue;
}

/**
 * Called after `source` took a new value.
 *
 * Propagation is unconditional: there is no comparison with the previous
 * value here. Use `onChange` to filter out non-changes.
 */
export function propagate(source: GraphNode): void {
  const affected = invalidate(source);
  if (!affected.length || scopes.length) return;
  if (wave) {
    for (let i = 0; i < affected.length; i++) wave.push(affected[i]!);
    return;
  }
  runWave(affected);
}

/** Called by a node once it recomputed successfully. */
export function settle(node: Dependent): void {
  stale.delete(node.ref);
  propagate(node);
}

/**
 * Bring `node` up to date on read.
 *
 * In eager mode the refresh runs as a wave of its own, so the dependents the
 * recompute dirties are brought up to date as well.
 */
export function pull(node: Dependent): void {
  if (wave || scopes.length) refresh(node);
  else runWave([node]);
}

/**
 * Recompute every node of `queue` that is still dirty. Nodes pushed onto the
 * queue while it runs are part of the same wave.
 */
function runWave(queue: Dependent[]): void {
  wave = queue;
  try {
    for (let i = 0; i < queue.length; i++) {
      const node = queue[i]!;
      if (node.dirty) refresh(node);
    }
  } finally {
    wave = null;
    prune();
  }
}

/** Drop registry entries that were collected or are no longer dirty. */
function prune(): void {
  for (const ref of stale) {
    if (!ref.deref()?.dirty) stale.delete(ref);
  }
}

/**
 * Iterative DFS to refresh a node and all its dirty dependencies.
 *
 * Algorithm:
 * 1. Start with the given node as current
 * 2. If current is dirty and has a dirty function dependency, push current
 *    onto the stack and descend into the first such dependency
 * 3. If current is dirty with no dirty dependencies, recompute it
 * 4. Pop from the stack and repeat until it is empty
 *
 * Dependencies are therefore recomputed before dependents, and siblings in
 * declaration order. An iterative walk keeps deep chains off the call stack.
 */
function refresh(node: Dependent): void {
  const stack = evalStack;
  const base = stack.length; // Remember stack position for nested calls
  let cur: Dependent | undefined = node;

  try {
    outer: while (cur) {
      if (cur.dirty && !cur.computing) {
        for (const source of cur.sources) {
          if (isDependent(source) && source.dirty && !source.computing) {
            stack.push(cur);
            cur = source;
            continue outer;
          }
        }
        cur.recompute();
      }
      cur = stack.length > base ? stack.pop() : undefined;
    }
  } finally {
    stack.length = base;
  }
}

/**
 * Recompute every dirty node still alive, in the order the nodes got dirty.
 * Runs when the outermost deferred scope exits.
 */
export function flush(): void {
  const pending: Dependent[] = [];
  for (const ref of stale) {
    const node = ref.deref();
    if (node?.dirty) pending.push(node);
    else stale.delete(ref);
  }
  if (!pending.length) return;
  if (wave) {
    for (let i = 0; i < pending.length; i++) wave.push(pending[i]!);
    return;
  }
  runWave(pending);
}
