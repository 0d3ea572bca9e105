import { Effect, Logger, LogLevel } from "effect";
import type { AzureDevOpsConfig } from "../../src/config.js";
import { type HttpRequester, type Transport, TransportLayer } from "../../src/Transport.js";
import { FakeAzureDevOps, ORG_URL } from "./fake-azure-devops.js";

export const PROJECT = "Platform";
export const REPO_ID = "5b3c9a20-4d1e-4f6a-9c8b-1a2b3c4d5e6f";
export const REPO_NAME = "widgets";

export const testConfig: AzureDevOpsConfig = {
  orgUrl: ORG_URL,
  credential: { type: "pat", token: "test-token" },
};

const provide = <A, E>(client: HttpRequester, effect: Effect.Effect<A, E, Transport>) =>
  effect.pipe(
    Effect.provide(TransportLayer(testConfig, client)),
    Logger.withMinimumLogLevel(LogLevel.None)
  );

/** Run an effect against the fake and return its value */
export const run = <A, E>(client: HttpRequester, effect: Effect.Effect<A, E, Transport>) =>
  Effect.runPromise(provide(client, effect));

/** Run an effect expected to fail and return its error */
export const failWith = <A, E>(client: HttpRequester, effect: Effect.Effect<A, E, Transport>) =>
  Effect.runPromise(provide(client, Effect.flip(effect)));

/** Narrow `value` to an instance of `ctor`, failing the test otherwise */
export function narrow<T>(value: unknown, ctor: abstract new (...args: never[]) => T): T {
  if (!(value instanceof ctor)) {
    throw new Error(`Expected ${ctor.name}, got ${String(value)}`);
  }
  return value;
}

/**
 * Fake with a single "widgets" repository. `refs` maps ref names to object
 * ids; every listed object id has README.md in its snapshot.
 */
export function widgetsFake(refs: Record<string, string>): FakeAzureDevOps {
  const fake = new FakeAzureDevOps();
  const files: Record<string, Record<string, string>> = {};
  for (const objectId of Object.values(refs)) {
    files[objectId] = { "/README.md": `# Widgets @ ${objectId}\n` };
  }
  fake.addRepository({
    project: PROJECT,
    id: REPO_ID,
    name: REPO_NAME,
    defaultBranch: "refs/heads/main",
    refs,
    files,
  });
  return fake;
}
