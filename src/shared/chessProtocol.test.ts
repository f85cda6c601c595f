import { describe, expect, it } from "vitest";
import { parseMoveRequestBody } from "./chessProtocol.ts";

describe("parseMoveRequestBody", () => {
  it("accepts from/to with an optional promotion", () => {
    expect(parseMoveRequestBody({ from: "e2", to: "e4" })).toEqual({ ok: true, body: { from: "e2", to: "e4" } });
    expect(parseMoveRequestBody({ from: "a7", to: "a8", promotion: "n" })).toEqual({
      ok: true,
      body: { from: "a7", to: "a8", promotion: "n" },
    });
  });

  it("treats a null promotion as absent", () => {
    expect(parseMoveRequestBody({ from: "e2", to: "e4", promotion: null })).toEqual({
      ok: true,
      body: { from: "e2", to: "e4" },
    });
  });

  it("does not judge square contents", () => {
    expect(parseMoveRequestBody({ from: "zz", to: "" })).toEqual({ ok: true, body: { from: "zz", to: "" } });
  });

  it("rejects non-objects", () => {
    expect(parseMoveRequestBody(null)).toEqual({ ok: false, error: "Request body must be a JSON object" });
    expect(parseMoveRequestBody(["e2", "e4"])).toEqual({ ok: false, error: "Request body must be a JSON object" });
    expect(parseMoveRequestBody("e2e4")).toEqual({ ok: false, error: "Request body must be a JSON object" });
  });

  it("rejects fields of the wrong type", () => {
    expect(parseMoveRequestBody({ to: "e4" })).toEqual({ ok: false, error: "Field 'from' must be a string" });
    expect(parseMoveRequestBody({ from: "e2", to: 4 })).toEqual({ ok: false, error: "Field 'to' must be a string" });
    expect(parseMoveRequestBody({ from: "a7", to: "a8", promotion: 1 })).toEqual({
      ok: false,
      error: "Field 'promotion' must be a string when present",
    });
  });
});
