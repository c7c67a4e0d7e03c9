import { describe, expect, it } from "vitest";
import { deepFreeze } from "../../freeze.js";

describe("deepFreeze", () => {
  it("recursively freezes nested objects", () => {
    const obj = { nested: { deep: { value: 42 } } };
    deepFreeze(obj);
    expect(Object.isFrozen(obj)).toBe(true);
    expect(Object.isFrozen(obj.nested)).toBe(true);
    expect(Object.isFrozen(obj.nested.deep)).toBe(true);
  });

  it("freezes nested arrays of objects", () => {
    const obj = { items: [{ id: 1 }, { id: 2 }] };
    deepFreeze(obj);
    expect(Object.isFrozen(obj.items)).toBe(true);
    expect(Object.isFrozen(obj.items[0])).toBe(true);
    expect(Object.isFrozen(obj.items[1])).toBe(true);
  });

  it("returns the same reference", () => {
    const obj = { a: 1 };
    expect(deepFreeze(obj)).toBe(obj);
  });

  it("passes through primitives and null", () => {
    expect(deepFreeze(42)).toBe(42);
    expect(deepFreeze("string")).toBe("string");
    expect(deepFreeze(null)).toBe(null);
    expect(deepFreeze(undefined)).toBe(undefined);
  });

  it("handles circular references", () => {
    const obj: { self?: unknown } = {};
    obj.self = obj;
    expect(() => deepFreeze(obj)).not.toThrow();
    expect(Object.isFrozen(obj)).toBe(true);
  });

  it("leaves byte buffers writable", () => {
    const obj = { bytes: new Uint8Array([1, 2, 3]) };
    deepFreeze(obj);
    expect(Object.isFrozen(obj)).toBe(true);
    expect(Object.isFrozen(obj.bytes)).toBe(false);
  });
});
