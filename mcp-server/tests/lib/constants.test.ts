import {
  ACTIVE_MARKERS,
  errorMessage,
  FIELDS,
  PLUGIN_IDS,
  TABLE_API_PATH,
  TABLES,
} from "@lib/constants";
import { describe, expect, it } from "vitest";

describe("constants", () => {
  it("targets the table API", () => {
    expect(TABLE_API_PATH).toBe("/api/now/table");
    expect(Object.values(TABLES).sort()).toStrictEqual([
      "sys_cors_rule",
      "sys_properties",
      "sys_ux_embeddable_macroponent",
      "v_plugin",
    ]);
  });

  it("names the plugins the embedding feature depends on", () => {
    expect(PLUGIN_IDS).toStrictEqual({
      CLIENT_ACCESS: "com.glide.security.client_access",
      EMBEDDABLES: "com.glide.ux.embeddables",
    });
  });

  it("requests the fields the checks read", () => {
    expect(FIELDS.EMBEDDABLE).toStrictEqual(["tag_name", "active", "sys_id"]);
    expect(ACTIVE_MARKERS).toStrictEqual({ PLUGIN: "active", RECORD: "true" });
  });

  describe("errorMessage", () => {
    it("returns message from Error instances", () => {
      expect(errorMessage(new Error("boom"))).toBe("boom");
    });

    it("stringifies non-Error values", () => {
      expect(errorMessage("plain")).toBe("plain");
      expect(errorMessage(42)).toBe("42");
    });
  });
});
