import { ConfigProvider, Effect } from "effect";
import { describe, expect, it } from "vitest";
import { AzureDevOpsConfigFromEnv, resolveConfig } from "../src/config.js";

const fromEnv = (entries: Array<[string, string]>) =>
  Effect.runSync(
    Effect.gen(function* () {
      return yield* AzureDevOpsConfigFromEnv;
    }).pipe(Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries))))
  );

describe("resolveConfig", () => {
  it("applies defaults and trims the organization URL", () => {
    expect(
      resolveConfig({
        orgUrl: "https://dev.azure.com/test-org/",
        credential: { type: "bearer", token: "test-token" },
      })
    ).toEqual({
      orgUrl: "https://dev.azure.com/test-org",
      credential: { type: "bearer", token: "test-token" },
      timeoutMs: 60_000,
      userAgent: "azure-repos-publisher/0.1.0",
      apiVersion: "7.1",
    });
  });
});

describe("AzureDevOpsConfigFromEnv", () => {
  it("reads the organization URL and PAT", () => {
    expect(
      fromEnv([
        ["AZDO_ORG_URL", "https://dev.azure.com/test-org"],
        ["AZDO_PAT", "test-secret"],
      ])
    ).toEqual({
      orgUrl: "https://dev.azure.com/test-org",
      credential: { type: "pat", token: "test-secret" },
      timeoutMs: 60_000,
    });
  });

  it("reads an explicit timeout", () => {
    const config = fromEnv([
      ["AZDO_ORG_URL", "https://dev.azure.com/test-org"],
      ["AZDO_PAT", "test-secret"],
      ["AZDO_TIMEOUT_MS", "5000"],
    ]);

    expect(config.timeoutMs).toBe(5000);
  });

  it("fails when the PAT is missing", () => {
    expect(() => fromEnv([["AZDO_ORG_URL", "https://dev.azure.com/test-org"]])).toThrow();
  });
});
