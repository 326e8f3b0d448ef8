/**
 * Signal - the state every reactive value shares, and the variable signal.
 */

import { propagate, type Dependent, type GraphNode } from "./context.js";
import { anyValue, checkValue, type ValueType } from "./types.js";

/** Common read interface of every signal. */
export interface Readable<T> extends GraphNode {
  readonly value: T;
  read(): T;
}

/** Options accepted by every signal constructor. */
export interface SignalOptions<T> {
  /** Constraint checked on every value. Defaults to accepting anything. */
  type?: ValueType<T>;
  /** Free text describing the signal, also used to label its errors. */
  documentation?: string;
}

/**
 * Base class of variables and functions: the current value, its declared
 * type, and the weak back-references to dependents.
 */
export abstract class Signal<T> implements Readable<T> {
  #value: T;
  readonly #type: ValueType<T>;
  readonly documentation: string | undefined;
  /** Sources never own their dependents: only weak references are kept. */
  #dependents: WeakRef<Dependent>[] = [];

  constructor(value: T, options: SignalOptions<T> = {}) {
    this.#type = options.type ?? anyValue<T>();
    this.documentation = options.documentation;
    this.#value = checkValue(this.#type, value, this.label);
  }

  abstract read(): T;

  get value(): T {
    return this.read();
  }

  get type(): ValueType<T> {
    return this.#type;
  }

  /** Live dependents. Collected ones are pruned on the way. */
  get dependents(): Dependent[] {
    return this.#prune();
  }

  /**
   * Register a dependent. Each dependent registers its one `ref` at most
   * once. Collected entries are pruned first, so a source that is never
   * written still only holds refs to live dependents.
   * @internal
   */
  addDependent(ref: WeakRef<Dependent>): void {
    this.#prune();
    this.#dependents.push(ref);
  }

  /** Compact the ref list in place, keeping order, and return live nodes. */
  #prune(): Dependent[] {
    const refs = this.#dependents;
    const live: Dependent[] = [];
    let kept = 0;
    for (let i = 0; i < refs.length; i++) {
      const ref = refs[i]!;
      const node = ref.deref();
      if (node) {
        refs[kept++] = ref;
        live.push(node);
      }
    }
    refs.length = kept;
    return live;
  }

  protected get label(): string {
    return this.documentation ?? this.constructor.name;
  }

  /** The stored value, without any refresh. */
  protected get current(): T {
    return this.#value;
  }

  /**
   * Check and store a new value. Throws TypeMismatchError before anything
   * changes.
   */
  protected assign(value: T): void {
    this.#value = checkValue(this.#type, value, this.label);
  }
}

/**
 * A signal whose value is set from outside.
 *
 * Every write propagates, even one that stores an equal value.
 *
 * @example
 * const count = signalVariable(0, { type: z.int() });
 * count.value; // 0
 * count.value = 1; // dependents recompute (or turn dirty in a deferred scope)
 */
export class SignalVariable<T> extends Signal<T> {
  override read(): T {
    return this.current;
  }

  override get value(): T {
    return this.current;
  }

  override set value(v: T) {
    this.write(v);
  }

  /** Store `v` and propagate it. Returns `v`. */
  write(v: T): T {
    this.assign(v);
    propagate(this);
    return v;
  }
}

/** Create a new signal variable */
export const signalVariable = <T>(value: T, options?: SignalOptions<T>) =>
  new SignalVariable(value, options);
