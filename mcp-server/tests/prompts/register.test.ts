import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { describe, expect, it, vi } from "vitest";

const { registerPrompts } = await import("@prompts/register");

function assertMcpServer(_: object): asserts _ is McpServer {
  // test mock assertion
}

type PromptHandler = (args: Record<string, string | undefined>) => {
  messages: { content: { text: string; type: string }; role: string }[];
};

function createMockServer() {
  const prompts = new Map<string, PromptHandler>();
  return {
    prompts,
    registerPrompt: vi.fn(
      (name: string, _config: unknown, handler: PromptHandler) => {
        prompts.set(name, handler);
      }
    ),
  };
}

describe("registerPrompts", () => {
  it("registers the diagnose prompt", () => {
    const server = createMockServer();
    assertMcpServer(server);
    registerPrompts(server);

    expect(server.registerPrompt).toHaveBeenCalledTimes(1);
    expect([...server.prompts.keys()]).toStrictEqual(["embeddables:diagnose"]);
  });

  it("fills the instance and domain into the instructions", () => {
    const server = createMockServer();
    assertMcpServer(server);
    registerPrompts(server);

    const handler = server.prompts.get("embeddables:diagnose");
    const result = handler?.({
      domain: "portal.example.com",
      instance_url: "dev.example.com",
    });

    expect(result?.messages).toHaveLength(1);
    expect(result?.messages[0].role).toBe("user");
    expect(result?.messages[0].content.text).toContain(
      'Call `run_all_checks` with instance_url: "dev.example.com", domain: "portal.example.com".'
    );
  });
});
