import {
  checkAllEmbeddableActivated,
  checkCorsRule,
  checkEmbeddableActivated,
  connectToInstance,
  runAllChecks,
} from "@lib/diagnostics";
import { describe, expect, it } from "vitest";

import {
  CREDENTIALS,
  EMBEDDING_DOMAIN,
  INSTANCE_URL,
  MACROPONENT_PREFIX,
} from "./fixtures";

const instance = INSTANCE_URL ?? "";

describe.skipIf(!INSTANCE_URL)("diagnostics (live)", () => {
  it("connects with the configured credentials", async () => {
    const result = await connectToInstance(instance, {
      credentials: CREDENTIALS,
    });
    expect(result).toStrictEqual({ message: "Connected", success: true });
  });

  it("rejects wrong credentials with 401", async () => {
    const result = await connectToInstance(instance, {
      credentials: { password: "wrong-password", username: "nobody" },
    });
    expect(result).toStrictEqual({ error: "HTTP 401", success: false });
  });

  it("counts embeddables consistently", async () => {
    const result = await checkAllEmbeddableActivated(instance, {
      credentials: CREDENTIALS,
    });
    if (!result.success) {
      throw new Error(result.error);
    }
    expect(result.total_count).toBe(result.embeddables.length);
    expect(result.active_count).toBe(
      result.embeddables.filter((e) => e.active).length
    );
  });

  it("finds embeddables by macroponent prefix", async () => {
    const result = await checkEmbeddableActivated(instance, MACROPONENT_PREFIX, {
      credentials: CREDENTIALS,
    });
    expect(result.success).toBe(true);
  });

  it("looks up CORS rules", async () => {
    const result = await checkCorsRule(instance, EMBEDDING_DOMAIN, {
      credentials: CREDENTIALS,
    });
    expect(result.success).toBe(true);
  });

  it("produces a report with every check succeeding", async () => {
    const report = await runAllChecks(instance, {
      credentials: CREDENTIALS,
      domain: EMBEDDING_DOMAIN,
    });
    for (const entry of Object.values(report)) {
      expect(entry.success).toBe(true);
    }
  });
});
