import { Layer } from "effect";
import { AzureRepos, type AzureReposService, createAzureRepos } from "./AzureRepos.js";
import type { AzureDevOpsConfig } from "./config.js";

// ─────────────────────────────────────────────────────────────────────────────
// Re-exports
// ─────────────────────────────────────────────────────────────────────────────

export {
  ZERO_OBJECT_ID,
  RefLookup,
  type RepositoryRef,
  type BranchPointer,
  type BranchAction,
  type BranchPublication,
  type ChangeType,
  type FileChange,
  type Commit,
  type PushResult,
  type PullRequest,
  type PublishFileChangeInput,
  type WorkflowResult,
  type WorkflowStep,
  type WorkflowProgress,
  type ProjectSummary,
  type RepositorySummary,
  type FileContent,
} from "./types.js";

export {
  AzureDevOpsConfigFromEnv,
  resolveConfig,
  type AzureDevOpsConfig,
  type Credential,
  type PatCredential,
  type BearerCredential,
} from "./config.js";

export {
  AuthenticationError,
  NotFoundError,
  RefNotFoundError,
  AmbiguousRefError,
  ConcurrencyConflictError,
  RefUpdateRejectedError,
  MalformedResponseError,
  RemoteApiError,
  NetworkError,
  TimeoutError,
  InvalidInputError,
  PublishWorkflowError,
  describeError,
  type AzureReposError,
  type TransportError,
  type WorkflowStepError,
} from "./errors.js";

export {
  Transport,
  TransportLayer,
  makeTransport,
  type TransportService,
  type HttpRequester,
  type HttpResponse,
} from "./Transport.js";

export { resolveRepository } from "./publish/repository-locator.js";
export { lookupRef, resolveRef, toBranchRef } from "./publish/ref-resolver.js";
export { publishBranch } from "./publish/branch-publisher.js";
export { pushCommit } from "./publish/commit-pusher.js";
export { openPullRequest } from "./publish/pull-request-opener.js";
export { publishFileChangeAsPullRequest } from "./publish/workflow.js";
export { listProjects, listRepositories, getFileContent } from "./catalog.js";

export { AzureRepos, createAzureRepos, type AzureReposService } from "./AzureRepos.js";

// ─────────────────────────────────────────────────────────────────────────────
// Layers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create an Effect Layer providing AzureReposService
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { AzureRepos, AzureReposLayer } from "azure-repos-publisher";
 *
 * const program = Effect.gen(function* () {
 *   const repos = yield* AzureRepos;
 *   return yield* repos.publishFileChangeAsPullRequest({
 *     project: "Platform",
 *     repository: "widgets",
 *     filePath: "/README.md",
 *     newContent: "# Widgets\n",
 *     pullRequestTitle: "Refresh README",
 *     baseBranch: "main",
 *     workingBranch: "docs/readme",
 *   });
 * });
 *
 * const result = await Effect.runPromise(
 *   program.pipe(
 *     Effect.provide(
 *       AzureReposLayer({
 *         orgUrl: "https://dev.azure.com/my-org",
 *         credential: { type: "pat", token: "..." },
 *       })
 *     )
 *   )
 * );
 * ```
 */
export function AzureReposLayer(
  config: AzureDevOpsConfig
): Layer.Layer<AzureReposService> {
  return Layer.sync(AzureRepos, () => createAzureRepos(config));
}
