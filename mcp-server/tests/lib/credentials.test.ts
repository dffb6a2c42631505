import { basicAuthHeader, resolveCredentials } from "@lib/credentials";
import { describe, expect, it } from "vitest";

describe("credentials", () => {
  describe("resolveCredentials", () => {
    const headers = { password: "header-pass", username: "header-user" };

    it("prefers explicit values over headers", () => {
      expect(
        resolveCredentials({ password: "test-secret", username: "admin" }, headers)
      ).toStrictEqual({ password: "test-secret", username: "admin" });
    });

    it("falls back to headers per field", () => {
      expect(resolveCredentials({ username: "admin" }, headers)).toStrictEqual({
        password: "header-pass",
        username: "admin",
      });
    });

    it("treats empty strings as absent", () => {
      expect(
        resolveCredentials({ password: "", username: "" }, headers)
      ).toStrictEqual({ password: "header-pass", username: "header-user" });
    });

    it("takes the first value of a repeated header", () => {
      expect(
        resolveCredentials({}, { password: ["one", "two"], username: "u" })
      ).toStrictEqual({ password: "one", username: "u" });
    });

    it("leaves both absent without explicit values or headers", () => {
      expect(resolveCredentials({})).toStrictEqual({
        password: undefined,
        username: undefined,
      });
    });

    it("ignores empty header values", () => {
      expect(
        resolveCredentials({}, { password: "", username: [] })
      ).toStrictEqual({ password: undefined, username: undefined });
    });
  });

  describe("basicAuthHeader", () => {
    it("encodes username and password", () => {
      expect(
        basicAuthHeader({ password: "test-secret", username: "admin" })
      ).toBe("Basic YWRtaW46dGVzdC1zZWNyZXQ=");
    });

    it("encodes a missing password as empty", () => {
      expect(basicAuthHeader({ username: "admin" })).toBe("Basic YWRtaW46");
    });

    it("returns undefined without credentials", () => {
      expect(basicAuthHeader({})).toBeUndefined();
    });
  });
});
