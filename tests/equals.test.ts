import { describe, it } from "node:test";
import assert from "node:assert";
import { deepEqual } from "../src/signals/index.js";

describe("deepEqual", () => {
  it("should compare primitives like Object.is", () => {
    assert.strictEqual(deepEqual(1, 1), true);
    assert.strictEqual(deepEqual("a", "b"), false);
    assert.strictEqual(deepEqual(NaN, NaN), true);
    assert.strictEqual(deepEqual(0, -0), false);
    assert.strictEqual(deepEqual(null, undefined), false);
  });

  it("should compare arrays element by element", () => {
    assert.strictEqual(deepEqual([1, [2, 3]], [1, [2, 3]]), true);
    assert.strictEqual(deepEqual([1, 2], [1, 2, 3]), false);
    assert.strictEqual(deepEqual([1, 2], { 0: 1, 1: 2 }), false);
  });

  it("should compare plain objects by their own keys", () => {
    assert.strictEqual(
      deepEqual({ a: 1, b: { c: 2 } }, { b: { c: 2 }, a: 1 }),
      true,
    );
    assert.strictEqual(deepEqual({ a: 1 }, { a: 1, b: undefined }), false);
    assert.strictEqual(deepEqual({ a: 1 }, { a: "1" }), false);
  });

  it("should compare dates by time", () => {
    assert.strictEqual(deepEqual(new Date(5), new Date(5)), true);
    assert.strictEqual(deepEqual(new Date(5), new Date(6)), false);
  });

  it("should compare maps and sets by content", () => {
    assert.strictEqual(
      deepEqual(new Map([["k", { v: 1 }]]), new Map([["k", { v: 1 }]])),
      true,
    );
    assert.strictEqual(
      deepEqual(new Map([["k", 1]]), new Map([["k", 2]])),
      false,
    );
    assert.strictEqual(deepEqual(new Set([1, 2]), new Set([2, 1])), true);
    assert.strictEqual(deepEqual(new Set([1, 2]), new Set([1, 3])), false);
  });

  it("should match set members structurally", () => {
    assert.strictEqual(
      deepEqual(new Set([{ a: 1 }, { a: 2 }]), new Set([{ a: 2 }, { a: 1 }])),
      true,
    );
    assert.strictEqual(
      deepEqual(new Set([{ a: 1 }]), new Set([{ a: 2 }])),
      false,
    );
    assert.strictEqual(
      deepEqual(new Set([{ a: 1 }, { a: 1 }]), new Set([{ a: 1 }, { a: 2 }])),
      false,
    );
  });

  it("should not equate instances of different classes", () => {
    class Point {
      constructor(
        readonly x: number,
        readonly y: number,
      ) {}
    }
    assert.strictEqual(deepEqual(new Point(1, 2), new Point(1, 2)), true);
    assert.strictEqual(deepEqual(new Point(1, 2), { x: 1, y: 2 }), false);
  });

  it("should compare functions by reference", () => {
    const f = () => 1;
    assert.strictEqual(deepEqual(f, f), true);
    assert.strictEqual(
      deepEqual(f, () => 1),
      false,
    );
  });

  it("should handle cyclic structures", () => {
    type Node = { name: string; next?: Node };
    const a: Node = { name: "n" };
    a.next = a;
    const b: Node = { name: "n" };
    b.next = b;
    assert.strictEqual(deepEqual(a, b), true);

    const c: Node = { name: "m" };
    c.next = c;
    assert.strictEqual(deepEqual(a, c), false);
  });
});
