import { afterEach, describe, it, expect, vi } from "vitest";

describe("env", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it("defaults to a silent logger and lenient updates under test", async () => {
    const { env } = await import("../src/config/env");

    expect(env.NODE_ENV).toBe("test");
    expect(env.LOG_LEVEL).toBe("silent");
    expect(env.ACTION_STRICT_UPDATE).toBe(false);
  });

  it("reads the strict update flag", async () => {
    vi.stubEnv("ACTION_STRICT_UPDATE", "yes");
    vi.resetModules();

    const { env } = await import("../src/config/env");

    expect(env.ACTION_STRICT_UPDATE).toBe(true);
  });

  it("refuses a flag it cannot read", async () => {
    vi.stubEnv("ACTION_STRICT_UPDATE", "maybe");
    vi.resetModules();

    await expect(import("../src/config/env")).rejects.toThrow(
      'ACTION_STRICT_UPDATE must be a boolean (true/false), got "maybe"'
    );
  });
});
