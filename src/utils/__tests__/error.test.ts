import { describe, expect, it } from "vitest";
import { AppError } from "utils/error";
import { MapError, MAP_ERROR, is_map_error } from "../error";

describe("MapError", () => {
  //=========================================================
  // Construction & properties
  //=========================================================

  it("stores the category", () => {
    const err = new MapError(MAP_ERROR.KEY_NOT_FOUND);
    expect(err.category).toBe(MAP_ERROR.KEY_NOT_FOUND);
  });

  it("uses category as default message when message is omitted", () => {
    const err = new MapError(MAP_ERROR.STALE_REFERENCE);
    expect(err.message).toBe(MAP_ERROR.STALE_REFERENCE);
  });

  it("uses provided message when given", () => {
    const err = new MapError(
      MAP_ERROR.MISSING_DEFAULT_VALUE,
      "no default configured",
    );
    expect(err.message).toBe("no default configured");
  });

  it("is always operational", () => {
    const err = new MapError(MAP_ERROR.KEY_NOT_FOUND);
    expect(err.is_operational).toBe(true);
  });

  it("context is undefined when not provided", () => {
    const err = new MapError(MAP_ERROR.KEY_NOT_FOUND);
    expect(err.context).toBeUndefined();
  });

  it("stores provided context", () => {
    const err = new MapError(MAP_ERROR.KEY_NOT_FOUND, undefined, { key: "k" });
    expect(err.context).toEqual({ key: "k" });
  });

  it("sets name to MapError", () => {
    const err = new MapError(MAP_ERROR.KEY_NOT_FOUND);
    expect(err.name).toBe("MapError");
  });

  //=========================================================
  // Inheritance
  //=========================================================

  it("is an instance of AppError and Error", () => {
    const err = new MapError(MAP_ERROR.STALE_REFERENCE);
    expect(err).toBeInstanceOf(AppError);
    expect(err).toBeInstanceOf(Error);
  });

  it("all MAP_ERROR enum members are distinct strings", () => {
    const values = Object.values(MAP_ERROR);
    expect(new Set(values).size).toBe(values.length);
  });

  //=========================================================
  // is_map_error guard
  //=========================================================

  it("is_map_error returns true for MapError instances", () => {
    expect(is_map_error(new MapError(MAP_ERROR.KEY_NOT_FOUND))).toBe(true);
  });

  it("is_map_error returns false for everything else", () => {
    expect(is_map_error(new Error("plain"))).toBe(false);
    expect(is_map_error(null)).toBe(false);
    expect(is_map_error(undefined)).toBe(false);
    expect(is_map_error("KEY_NOT_FOUND")).toBe(false);
    expect(is_map_error({ category: MAP_ERROR.KEY_NOT_FOUND })).toBe(false);
  });
});
