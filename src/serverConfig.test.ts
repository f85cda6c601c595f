import { describe, expect, it } from "vitest";
import { DEFAULT_PORT, loadServerConfig } from "../server/src/config.ts";

describe("loadServerConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadServerConfig({})).toEqual({
      port: DEFAULT_PORT,
      corsOrigins: ["http://localhost:3000"],
      requestLog: true,
    });
  });

  it("reads port, origins and request logging", () => {
    expect(
      loadServerConfig({
        PORT: "9123",
        CHESS_CORS_ORIGINS: "http://localhost:5173, https://chess.example.test ,",
        CHESS_REQUEST_LOG: "0",
      })
    ).toEqual({
      port: 9123,
      corsOrigins: ["http://localhost:5173", "https://chess.example.test"],
      requestLog: false,
    });
  });

  it("treats a blank PORT as unset", () => {
    expect(loadServerConfig({ PORT: "  " }).port).toBe(DEFAULT_PORT);
  });

  it("rejects an invalid port", () => {
    expect(() => loadServerConfig({ PORT: "http" })).toThrow("Invalid PORT: http");
    expect(() => loadServerConfig({ PORT: "70000" })).toThrow("Invalid PORT: 70000");
  });
});
