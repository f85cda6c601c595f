import { describe, it, expect } from "vitest";
import { DEFAULT_PROMOTION, isPromotionRow, parsePromotionCode, promotedPiece } from "./promote.ts";

describe("promotion codes", () => {
  it("parses q, r, b, n in any case", () => {
    expect(parsePromotionCode("q")).toBe("q");
    expect(parsePromotionCode("R")).toBe("r");
    expect(parsePromotionCode("b")).toBe("b");
    expect(parsePromotionCode("N")).toBe("n");
  });

  it("rejects anything else", () => {
    expect(parsePromotionCode("k")).toBeNull();
    expect(parsePromotionCode("p")).toBeNull();
    expect(parsePromotionCode("")).toBeNull();
    expect(parsePromotionCode("qq")).toBeNull();
  });

  it("defaults to a queen", () => {
    expect(DEFAULT_PROMOTION).toBe("q");
    expect(promotedPiece("black", DEFAULT_PROMOTION)).toEqual({ type: "queen", color: "black" });
  });

  it("builds the promoted piece for the mover's color", () => {
    expect(promotedPiece("white", "n")).toEqual({ type: "knight", color: "white" });
    expect(promotedPiece("white", "r")).toEqual({ type: "rook", color: "white" });
    expect(promotedPiece("black", "b")).toEqual({ type: "bishop", color: "black" });
  });

  it("only the outer rows promote", () => {
    expect(isPromotionRow(0)).toBe(true);
    expect(isPromotionRow(7)).toBe(true);
    expect(isPromotionRow(1)).toBe(false);
    expect(isPromotionRow(6)).toBe(false);
  });
});
