export {
  signalVariable,
  signalFunction,
  onChange,
  deferred,
  enterDeferredScope,
  exitDeferredScope,
  inDeferredScope,
  read,
  write,
  isSignal,
  deepEqual,
  anyValue,
  Signal,
  SignalVariable,
  SignalFunction,
  ChangeSignal,
  DeferredScope,
  SignalError,
  TypeMismatchError,
  ComputeError,
  DeferredScopeError,
} from "./signals/index.js";
export type {
  Readable,
  SignalOptions,
  ComputeStep,
  Dependencies,
  DependencyValues,
  Equality,
  ValueType,
} from "./signals/index.js";
