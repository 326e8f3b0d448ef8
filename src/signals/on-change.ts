/**
 * onChange - Filter out updates that do not change a signal's value.
 */

import { SignalFunction } from "./computed.js";
import { deepEqual, type Equality } from "./equals.js";
import { SignalVariable, type Readable } from "./signal.js";

/**
 * The signal returned by `onChange`.
 *
 * It reads an internal variable holding the last distinct value of the
 * source. An internal updater function, subscribed to the source, writes
 * that variable only when the source's new value differs from it. The
 * source holds the updater weakly like any other dependent, so this signal
 * keeps the updater alive for as long as it is itself reachable.
 */
export class ChangeSignal<T> extends SignalFunction<
  T,
  { latest: SignalVariable<T> }
> {
  readonly #updater: SignalFunction<T, { source: Readable<T> }>;

  constructor(
    latest: SignalVariable<T>,
    updater: SignalFunction<T, { source: Readable<T> }>,
    documentation?: string,
  ) {
    super({ latest }, ({ latest }) => latest, { documentation });
    this.#updater = updater;
  }

  /**
   * Within a deferred scope the updater may still be dirty. Bring it up to
   * date first so a direct read sees the latest distinct value.
   */
  override read(): T {
    if (this.#updater.dirty) this.#updater.read();
    return super.read();
  }
}

/**
 * Wrap `source` so that dependents only see its real changes.
 *
 * Writes that leave the source `equals`-equal to the last recorded value do
 * not start a recomputation wave past the returned signal.
 *
 * @param equals - Equality test, structural by default
 *
 * @example
 * const point = signalVariable({ x: 0, y: 0 });
 * const moved = onChange(point);
 * const label = signalFunction({ moved }, ({ moved }) => `${moved.x}`);
 * point.value = { x: 0, y: 0 }; // label does not recompute
 * point.value = { x: 1, y: 0 }; // label recomputes: "1"
 */
export function onChange<T>(
  source: Readable<T>,
  equals: Equality<T> = deepEqual,
  documentation?: string,
): ChangeSignal<T> {
  const latest = new SignalVariable(source.value);
  const updater = new SignalFunction({ source }, ({ source: next }) => {
    if (!equals(latest.value, next)) latest.value = next;
    return next;
  });
  return new ChangeSignal(latest, updater, documentation);
}
