/**
 * SignalFunction - a value derived from declared dependencies.
 */

import { pull, settle, type Dependent } from "./context.js";
import { ComputeError, SignalError } from "./errors.js";
import { Signal, type Readable, type SignalOptions } from "./signal.js";

/** Named dependencies of a signal function, in declaration order. */
export type Dependencies = Record<string, Readable<unknown>>;

/** The values a compute step receives: one per dependency, same keys. */
export type DependencyValues<D extends Dependencies> = {
  [K in keyof D]: D[K]["value"];
};

/** A pure step from the current dependency values to a new value. */
export type ComputeStep<T, D extends Dependencies> = (
  values: DependencyValues<D>,
) => T;

/**
 * Read every dependency and run `compute` over the values. Reading pulls
 * dependencies that are dirty, so the step always sees the latest values.
 */
function evaluate<T, D extends Dependencies>(
  dependencies: D,
  compute: ComputeStep<T, D>,
  label: string,
): T {
  const sources: Dependencies = dependencies;
  const values: Record<string, unknown> = {};
  for (const [key, source] of Object.entries(sources)) {
    values[key] = source.value;
  }
  try {
    return compute(values as DependencyValues<D>);
  } catch (error) {
    if (error instanceof SignalError) throw error;
    throw new ComputeError(label, error);
  }
}

/**
 * A derived reactive value.
 *
 * The dependency list is fixed at construction: the compute step receives
 * the values of exactly those signals, and reading any other signal inside
 * it does not subscribe to it. Construction evaluates the step once, so a
 * signal function is never observed without a value.
 *
 * @example
 * const x = signalVariable(1);
 * const y = signalFunction({ x }, ({ x }) => x + 1);
 * y.value; // 2
 * x.value = 5;
 * y.value; // 6, recomputed during the write
 */
export class SignalFunction<T, D extends Dependencies = Dependencies>
  extends Signal<T>
  implements Dependent
{
  readonly #dependencies: D;
  readonly #compute: ComputeStep<T, D>;
  #dirty = false;
  #computing = false; // Guard against re-entrant recompute

  readonly ref: WeakRef<Dependent> = new WeakRef(this);

  constructor(
    dependencies: D,
    compute: ComputeStep<T, D>,
    options: SignalOptions<T> = {},
  ) {
    super(
      evaluate(dependencies, compute, options.documentation ?? new.target.name),
      options,
    );
    this.#dependencies = { ...dependencies };
    Object.freeze(this.#dependencies);
    this.#compute = compute;

    // Only register once the initial value is known to be valid
    for (const source of new Set(this.sources)) {
      source.addDependent(this.ref);
    }
  }

  override read(): T {
    if (this.#dirty) pull(this);
    return this.current;
  }

  get dirty(): boolean {
    return this.#dirty;
  }

  get computing(): boolean {
    return this.#computing;
  }

  get dependencies(): Readonly<D> {
    return this.#dependencies;
  }

  get sources(): Readable<unknown>[] {
    const dependencies: Dependencies = this.#dependencies;
    return Object.values(dependencies);
  }

  /** @internal */
  markDirty(): boolean {
    if (this.#dirty) return false;
    this.#dirty = true;
    return true;
  }

  /**
   * Re-run the compute step over the latest dependency values.
   *
   * On failure the previous value and the dirty flag are left as they were.
   * On success the new value propagates to dependents unconditionally.
   * @internal
   */
  recompute(): void {
    if (this.#computing) return;
    this.#computing = true;
    try {
      this.assign(evaluate(this.#dependencies, this.#compute, this.label));
      this.#dirty = false;
    } finally {
      this.#computing = false;
    }
    settle(this);
  }
}

/** Create a new signal function */
export const signalFunction = <T, D extends Dependencies>(
  dependencies: D,
  compute: ComputeStep<T, D>,
  options?: SignalOptions<T>,
) => new SignalFunction(dependencies, compute, options);
