import { Context, Effect } from "effect";
import type { AzureDevOpsConfig } from "./config.js";
import type {
  CatalogError,
  LookupRefError,
  OpenPullRequestError,
  PublishBranchError,
  PublishWorkflowError,
  PushCommitError,
  ResolveRefError,
  ResolveRepositoryError,
  TransportError,
} from "./errors.js";
import { getFileContent, listProjects, listRepositories } from "./catalog.js";
import { publishBranch } from "./publish/branch-publisher.js";
import { pushCommit } from "./publish/commit-pusher.js";
import { openPullRequest } from "./publish/pull-request-opener.js";
import { lookupRef, resolveRef } from "./publish/ref-resolver.js";
import { resolveRepository } from "./publish/repository-locator.js";
import { publishFileChangeAsPullRequest } from "./publish/workflow.js";
import { type HttpRequester, Transport, makeTransport } from "./Transport.js";
import type {
  BranchPublication,
  Commit,
  FileContent,
  ProjectSummary,
  PublishFileChangeInput,
  PullRequest,
  PushResult,
  RefLookup,
  RepositoryRef,
  RepositorySummary,
  WorkflowResult,
} from "./types.js";

/**
 * Azure Repos service interface
 *
 * Publishes file changes as pull requests and browses projects,
 * repositories and files of one Azure DevOps organization.
 */
export interface AzureReposService {
  // ─────────────────────────────────────────────────────────────────
  // Workflow
  // ─────────────────────────────────────────────────────────────────

  /**
   * Create or reset a working branch at the base tip, push one file
   * change onto it and open a pull request into the base
   */
  publishFileChangeAsPullRequest(
    input: PublishFileChangeInput
  ): Effect.Effect<WorkflowResult, PublishWorkflowError>;

  // ─────────────────────────────────────────────────────────────────
  // Workflow steps
  // ─────────────────────────────────────────────────────────────────

  resolveRepository(
    project: string,
    repository: string
  ): Effect.Effect<RepositoryRef, ResolveRepositoryError>;

  lookupRef(
    project: string,
    repositoryId: string,
    refName: string
  ): Effect.Effect<RefLookup, LookupRefError>;

  resolveRef(
    project: string,
    repositoryId: string,
    refName: string
  ): Effect.Effect<string, ResolveRefError>;

  publishBranch(
    project: string,
    repositoryId: string,
    refName: string,
    baseObjectId: string
  ): Effect.Effect<BranchPublication, PublishBranchError>;

  pushCommit(
    project: string,
    repositoryId: string,
    refName: string,
    expectedObjectId: string,
    commit: Commit
  ): Effect.Effect<PushResult, PushCommitError>;

  openPullRequest(
    project: string,
    repositoryId: string,
    sourceRefName: string,
    targetRefName: string,
    title: string,
    description?: string
  ): Effect.Effect<PullRequest, OpenPullRequestError>;

  // ─────────────────────────────────────────────────────────────────
  // Catalog
  // ─────────────────────────────────────────────────────────────────

  listProjects(): Effect.Effect<ProjectSummary[], TransportError>;

  listRepositories(
    project: string
  ): Effect.Effect<RepositorySummary[], CatalogError>;

  /**
   * Read a text file at the tip of a branch (defaults to "main")
   */
  getFileContent(
    project: string,
    repository: string,
    path: string,
    branch?: string
  ): Effect.Effect<FileContent, CatalogError>;
}

/**
 * Effect Context tag for AzureReposService
 */
export const AzureRepos = Context.GenericTag<AzureReposService>("AzureRepos");

/**
 * Create an AzureReposService bound to one organization and credential
 */
export function createAzureRepos(
  config: AzureDevOpsConfig,
  client?: HttpRequester
): AzureReposService {
  const transport = makeTransport(config, client);
  const run = <A, E>(effect: Effect.Effect<A, E, Transport>) =>
    Effect.provideService(effect, Transport, transport);

  return {
    publishFileChangeAsPullRequest: (input) =>
      run(publishFileChangeAsPullRequest(input)),

    resolveRepository: (project, repository) =>
      run(resolveRepository(project, repository)),
    lookupRef: (project, repositoryId, refName) =>
      run(lookupRef(project, repositoryId, refName)),
    resolveRef: (project, repositoryId, refName) =>
      run(resolveRef(project, repositoryId, refName)),
    publishBranch: (project, repositoryId, refName, baseObjectId) =>
      run(publishBranch(project, repositoryId, refName, baseObjectId)),
    pushCommit: (project, repositoryId, refName, expectedObjectId, commit) =>
      run(pushCommit(project, repositoryId, refName, expectedObjectId, commit)),
    openPullRequest: (project, repositoryId, sourceRefName, targetRefName, title, description) =>
      run(
        openPullRequest(project, repositoryId, sourceRefName, targetRefName, title, description)
      ),

    listProjects: () => run(listProjects()),
    listRepositories: (project) => run(listRepositories(project)),
    getFileContent: (project, repository, path, branch) =>
      run(getFileContent(project, repository, path, branch)),
  };
}
