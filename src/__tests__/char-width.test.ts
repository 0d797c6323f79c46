import { describe, it, expect } from "vitest";
import {
  NARROW,
  WIDE,
  canRepresent,
  isRepresentable,
  toNarrow,
  toWide,
} from "../core/char-width.js";

describe("char widths", () => {
  it("describes both widths", () => {
    expect(NARROW).toEqual({ name: "narrow", bits: 8, maxUnit: 0xff });
    expect(WIDE).toEqual({ name: "wide", bits: 16, maxUnit: 0xffff });
    expect(Object.isFrozen(NARROW)).toBe(true);
  });

  describe("canRepresent", () => {
    it("bounds units by width", () => {
      expect(canRepresent(NARROW, 0)).toBe(true);
      expect(canRepresent(NARROW, 0xff)).toBe(true);
      expect(canRepresent(NARROW, 0x100)).toBe(false);
      expect(canRepresent(WIDE, 0xffff)).toBe(true);
      expect(canRepresent(WIDE, 0x10000)).toBe(false);
      expect(canRepresent(WIDE, -1)).toBe(false);
    });
  });

  describe("isRepresentable", () => {
    it("checks every code unit", () => {
      expect(isRepresentable("héllo", NARROW)).toBe(true);
      expect(isRepresentable("hĀllo", NARROW)).toBe(false);
      expect(isRepresentable("hĀllo", WIDE)).toBe(true);
      expect(isRepresentable("", NARROW)).toBe(true);
    });
  });

  describe("toNarrow", () => {
    it("keeps Latin-1 text", () => {
      expect(toNarrow("café")).toBe("café");
    });

    it("truncates wider units to their low byte", () => {
      expect(toNarrow("ĀA")).toBe("\u0000A");
      expect(toNarrow("ǿ")).toBe("ÿ");
    });
  });

  describe("toWide", () => {
    it("keeps every unit", () => {
      expect(toWide("café")).toBe("café");
      expect(toWide(toNarrow("xŁ"))).toBe("xA");
    });
  });
});
