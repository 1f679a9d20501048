import { describe, expect, it } from "vitest";
import {
  is_non_negative_integer,
  is_positive_integer,
  unsafe_cast,
  validate_and_cast,
} from "../assertions";
import { TypeError, TYPE_ERROR } from "../error";

describe("assertions", () => {
  //=========================================================
  // is_non_negative_integer / is_positive_integer
  //=========================================================

  it("is_non_negative_integer accepts zero and positive integers", () => {
    expect(is_non_negative_integer(0)).toBe(true);
    expect(is_non_negative_integer(1)).toBe(true);
    expect(is_non_negative_integer(0xffffffff)).toBe(true);
  });

  it("is_non_negative_integer rejects negatives and non-integers", () => {
    expect(is_non_negative_integer(-1)).toBe(false);
    expect(is_non_negative_integer(1.5)).toBe(false);
    expect(is_non_negative_integer(NaN)).toBe(false);
    expect(is_non_negative_integer(Infinity)).toBe(false);
  });

  it("is_positive_integer rejects zero", () => {
    expect(is_positive_integer(0)).toBe(false);
    expect(is_positive_integer(1)).toBe(true);
    expect(is_positive_integer(2.5)).toBe(false);
  });

  //=========================================================
  // validate_and_cast
  //=========================================================

  it("validate_and_cast returns the value when validation passes", () => {
    expect(validate_and_cast(42, is_positive_integer, "positive")).toBe(42);
  });

  it("validate_and_cast throws TypeError when validation fails", () => {
    expect(() => validate_and_cast(-1, is_positive_integer, "positive")).toThrow(
      TypeError,
    );
  });

  it("validate_and_cast error carries category, message and value", () => {
    let caught: unknown;
    try {
      validate_and_cast(-1, is_positive_integer, "positive number");
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(TypeError);
    const err = unsafe_cast<TypeError>(caught);
    expect(err.category).toBe(TYPE_ERROR.VALIDATION_FAIL_CONDITION);
    expect(err.message).toBe(
      "Expected value to meet validation: positive number",
    );
    expect(err.context).toEqual({ value: -1 });
    expect(err.is_operational).toBe(false);
  });

  //=========================================================
  // unsafe_cast
  //=========================================================

  it("unsafe_cast returns the same value unchanged", () => {
    const obj = { x: 1 };
    expect(unsafe_cast<number>(42)).toBe(42);
    expect(unsafe_cast<{ x: number }>(obj)).toBe(obj);
    expect(unsafe_cast<string>(undefined)).toBeUndefined();
  });
});
