import { describe, it, expect } from "vitest";
import {
  validationResult,
  requireFiniteNumber,
  requireNumberRange,
  requireOneOf,
  requireIntRange,
  requireRecord,
} from "./validation.js";

describe("validationResult", () => {
  it("returns valid when no errors", () => {
    const result = validationResult([]);
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
  });

  it("returns invalid when errors present", () => {
    const result = validationResult(["bad field"]);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["bad field"]);
  });
});

describe("requireFiniteNumber", () => {
  it("accepts finite numbers", () => {
    const errors: string[] = [];
    requireFiniteNumber(0.5, "ratio", errors);
    expect(errors).toHaveLength(0);
  });

  it("rejects NaN and strings", () => {
    const errors: string[] = [];
    requireFiniteNumber(Number.NaN, "a", errors);
    requireFiniteNumber("3", "b", errors);
    expect(errors).toEqual([
      "a must be a finite number",
      "b must be a finite number",
    ]);
  });
});

describe("requireNumberRange", () => {
  it("accepts the bounds", () => {
    const errors: string[] = [];
    requireNumberRange(0, "x", 0, 1, errors);
    requireNumberRange(1, "x", 0, 1, errors);
    expect(errors).toHaveLength(0);
  });

  it("rejects out-of-range values", () => {
    const errors: string[] = [];
    requireNumberRange(1.5, "audit.confidenceThreshold", 0, 1, errors);
    expect(errors).toEqual([
      "audit.confidenceThreshold must be a number between 0 and 1",
    ]);
  });
});

describe("requireOneOf", () => {
  const allowed = new Set(["FAST", "ADAPTIVE"]);

  it("accepts an allowed value", () => {
    const errors: string[] = [];
    requireOneOf("FAST", "strategy", allowed, errors);
    expect(errors).toHaveLength(0);
  });

  it("lists allowed values in the error", () => {
    const errors: string[] = [];
    requireOneOf("SLOW", "strategy", allowed, errors);
    expect(errors).toEqual(["strategy must be one of: FAST, ADAPTIVE"]);
  });
});

describe("requireIntRange", () => {
  it("rejects non-integers", () => {
    const errors: string[] = [];
    requireIntRange(2.5, "n", 1, 10, errors);
    expect(errors).toEqual(["n must be an integer between 1 and 10"]);
  });

  it("accepts integers in range", () => {
    const errors: string[] = [];
    requireIntRange(10, "n", 1, 10, errors);
    expect(errors).toHaveLength(0);
  });
});

describe("requireRecord", () => {
  it("returns the record for objects", () => {
    const errors: string[] = [];
    const section = { a: 1 };
    expect(requireRecord(section, "s", errors)).toBe(section);
    expect(errors).toHaveLength(0);
  });

  it("returns null and records arrays as invalid", () => {
    const errors: string[] = [];
    expect(requireRecord([], "tiers", errors)).toBeNull();
    expect(errors).toEqual(["tiers must be an object"]);
  });
});
