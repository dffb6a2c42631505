import { loadConfig } from "@lib/config";
import { describe, expect, it } from "vitest";

describe("config", () => {
  describe("loadConfig", () => {
    it("applies defaults", () => {
      expect(loadConfig({})).toStrictEqual({
        host: "0.0.0.0",
        path: "/mcp",
        port: 8005,
        transport: "stdio",
      });
    });

    it("reads overrides from the environment", () => {
      expect(
        loadConfig({
          HOST: "127.0.0.1",
          MCP_PATH: "/mcp/diagnostics",
          MCP_TRANSPORT: "http",
          PORT: "9000",
        })
      ).toStrictEqual({
        host: "127.0.0.1",
        path: "/mcp/diagnostics",
        port: 9000,
        transport: "http",
      });
    });

    it("rejects an unknown transport", () => {
      expect(() => loadConfig({ MCP_TRANSPORT: "sse" })).toThrow(
        /^Invalid configuration: MCP_TRANSPORT: /
      );
    });

    it("rejects a port out of range", () => {
      expect(() => loadConfig({ PORT: "70000" })).toThrow(
        /Invalid configuration: PORT: /
      );
    });

    it("rejects a path without a leading slash", () => {
      expect(() => loadConfig({ MCP_PATH: "mcp" })).toThrow(
        "Invalid configuration: MCP_PATH: must start with /"
      );
    });

    it("names every invalid variable", () => {
      expect(() => loadConfig({ MCP_PATH: "mcp", PORT: "abc" })).toThrow(
        /MCP_PATH: must start with \/; PORT: /
      );
    });
  });
});
