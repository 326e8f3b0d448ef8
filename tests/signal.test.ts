import { describe, it } from "node:test";
import assert from "node:assert";
import { z } from "zod/v4";
import {
  SignalVariable,
  TypeMismatchError,
  isSignal,
  read,
  signalFunction,
  signalVariable,
  write,
} from "../src/signals/index.js";

describe("SignalVariable", () => {
  it("should store and retrieve a value", () => {
    const count = signalVariable(10);
    assert.strictEqual(count.value, 10);
    assert.strictEqual(count.read(), 10);
  });

  it("should update value", () => {
    const count = new SignalVariable(10);
    count.value = 20;
    assert.strictEqual(count.value, 20);
  });

  it("should return the written value from write", () => {
    const name = signalVariable("a");
    assert.strictEqual(name.write("b"), "b");
    assert.strictEqual(name.value, "b");
  });

  it("should expose free-function read and write", () => {
    const count = signalVariable(1);
    assert.strictEqual(write(count, 2), 2);
    assert.strictEqual(read(count), 2);
  });

  it("should keep its documentation", () => {
    const count = signalVariable(0, { documentation: "clicks so far" });
    assert.strictEqual(count.documentation, "clicks so far");
    assert.strictEqual(signalVariable(0).documentation, undefined);
  });

  it("should propagate a write even when the value is the same", () => {
    const count = signalVariable(1);
    let runs = 0;
    const copy = signalFunction({ count }, ({ count }) => {
      runs++;
      return count;
    });
    assert.strictEqual(runs, 1);

    count.value = 1;
    assert.strictEqual(runs, 2);
    assert.strictEqual(copy.value, 1);
  });

  it("should store the given object, not a parsed copy", () => {
    const point = { x: 1, y: 2 };
    const type = z.object({ x: z.number(), y: z.number() });
    const position = signalVariable(point, { type });
    assert.strictEqual(position.value, point);
  });
});

describe("Value types", () => {
  it("should reject an initial value that violates the type", () => {
    assert.throws(
      () => signalVariable(1.5, { type: z.int() }),
      TypeMismatchError,
    );
  });

  it("should reject an invalid write and keep the previous value", () => {
    const count = signalVariable(3, { type: z.int() });
    assert.throws(() => {
      count.value = 3.5;
    }, TypeMismatchError);
    assert.strictEqual(count.value, 3);
  });

  it("should not propagate a rejected write", () => {
    const count = signalVariable(3, { type: z.int() });
    let runs = 0;
    const copy = signalFunction({ count }, ({ count }) => {
      runs++;
      return count;
    });
    const keep = signalFunction({ count }, ({ count }) => count * 2);

    assert.throws(() => count.write(0.5), TypeMismatchError);
    assert.strictEqual(keep.value, 6);
    assert.strictEqual(keep.dirty, false);
    assert.strictEqual(runs, 1);
    assert.strictEqual(copy.value, 3);
  });

  it("should describe the value and the signal in the error", () => {
    const level = signalVariable<string>("low", {
      type: z.enum(["low", "high"]),
      documentation: "alert level",
    });
    try {
      level.value = "medium";
      assert.fail("expected a TypeMismatchError");
    } catch (error) {
      assert.ok(error instanceof TypeMismatchError);
      assert.strictEqual(error.name, "TypeMismatchError");
      assert.strictEqual(error.value, "medium");
      assert.strictEqual(error.issues.length, 1);
      assert.ok(error.message.startsWith('alert level: value "medium"'));
    }
  });

  it("should accept anything of the static type when no type is given", () => {
    const anything = signalVariable<unknown>(1);
    anything.value = "text";
    anything.value = null;
    assert.strictEqual(anything.value, null);
  });

  it("should expose the declared type", () => {
    const type = z.string();
    assert.strictEqual(signalVariable("a", { type }).type, type);
  });
});

describe("isSignal", () => {
  it("should recognise variables and functions", () => {
    const x = signalVariable(1);
    const y = signalFunction({ x }, ({ x }) => x);
    assert.strictEqual(isSignal(x), true);
    assert.strictEqual(isSignal(y), true);
    assert.strictEqual(isSignal({ value: 1 }), false);
    assert.strictEqual(isSignal(null), false);
  });
});
