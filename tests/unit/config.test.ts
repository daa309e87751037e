import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

describe("config", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    vi.resetModules();
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("should read agent user id from environment", async () => {
    process.env.AGENT_USER_ID = "home-agent";

    const config = (await import("../../src/config.ts")).default;

    expect(config.agentUserId).toBe("home-agent");
  });

  it("should throw when AGENT_USER_ID is missing", async () => {
    delete process.env.AGENT_USER_ID;

    await expect(import("../../src/config.ts")).rejects.toThrow(
      "Missing required environment variable: AGENT_USER_ID"
    );
  });
});
