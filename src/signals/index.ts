/**
 * Reactive signals with explicitly declared dependencies.
 *
 * A signal function names the signals it depends on when it is created;
 * reads are never traced. Sources hold their dependents weakly, so a
 * signal function lives exactly as long as something references it.
 */

export {
  Signal,
  SignalVariable,
  signalVariable,
  type Readable,
  type SignalOptions,
} from "./signal.js";
export {
  SignalFunction,
  signalFunction,
  type ComputeStep,
  type Dependencies,
  type DependencyValues,
} from "./computed.js";
export {
  DeferredScope,
  deferred,
  enterDeferredScope,
  exitDeferredScope,
  inDeferredScope,
} from "./deferred.js";
export { ChangeSignal, onChange } from "./on-change.js";
export { deepEqual, type Equality } from "./equals.js";
export { anyValue, type ValueType } from "./types.js";
export {
  ComputeError,
  DeferredScopeError,
  SignalError,
  TypeMismatchError,
} from "./errors.js";

import { Signal, type Readable, type SignalVariable } from "./signal.js";

/** Read the current value of a signal. */
export const read = <T>(signal: Readable<T>): T => signal.read();

/** Write a signal variable. Returns the value written. */
export const write = <T>(signal: SignalVariable<T>, value: T): T =>
  signal.write(value);

/** Check if a value is a signal (variable or function). */
export const isSignal = (value: unknown): value is Signal<unknown> =>
  value instanceof Signal;
