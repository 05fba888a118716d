import { describe, expect, it } from "vitest";
import { asArray, asObject, firstPresent, parseHashrate, pickBoolean, pickNumber, toNumber } from "./normalize";

describe("parseHashrate", () => {
  it("scales SI suffixes", () => {
    expect(parseHashrate("11.5T")).toBe(11.5e12);
    expect(parseHashrate("602M")).toBe(602e6);
    expect(parseHashrate("3K")).toBe(3000);
    expect(parseHashrate("2G")).toBe(2e9);
    expect(parseHashrate("1P")).toBe(1e15);
    expect(parseHashrate("1E")).toBe(1e18);
  });

  it("accepts lowercase suffixes and surrounding whitespace", () => {
    expect(parseHashrate(" 4.5t ")).toBe(4.5e12);
  });

  it("passes numbers through", () => {
    expect(parseHashrate(1234.5)).toBe(1234.5);
    expect(parseHashrate("1234")).toBe(1234);
  });

  it("returns 0 for empty or unparseable input", () => {
    expect(parseHashrate("")).toBe(0);
    expect(parseHashrate("0")).toBe(0);
    expect(parseHashrate("abc")).toBe(0);
    expect(parseHashrate("12X")).toBe(0);
    expect(parseHashrate("T")).toBe(0);
    expect(parseHashrate(null)).toBe(0);
    expect(parseHashrate(undefined)).toBe(0);
    expect(parseHashrate(Number.NaN)).toBe(0);
    expect(parseHashrate({})).toBe(0);
  });
});

describe("field coercion", () => {
  it("reads numbers from numbers and numeric strings only", () => {
    expect(pickNumber(5)).toBe(5);
    expect(pickNumber("5.5")).toBe(5.5);
    expect(pickNumber("")).toBeNull();
    expect(pickNumber("n/a")).toBeNull();
    expect(pickNumber(null)).toBeNull();
    expect(toNumber(undefined)).toBe(0);
    expect(toNumber("x", 7)).toBe(7);
  });

  it("guards object and array access", () => {
    expect(asObject([1, 2])).toEqual({});
    expect(asObject({ a: 1 })).toEqual({ a: 1 });
    expect(asArray("nope")).toEqual([]);
  });

  it("maps loose booleans", () => {
    expect(pickBoolean(1)).toBe(true);
    expect(pickBoolean("false")).toBe(false);
    expect(pickBoolean("yes")).toBeNull();
  });

  it("returns the first non-null key", () => {
    expect(firstPresent({ a: null, b: 0, c: 2 }, ["a", "b", "c"])).toBe(0);
    expect(firstPresent({}, ["a"])).toBeUndefined();
  });
});
