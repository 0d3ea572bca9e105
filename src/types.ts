import { Data } from "effect";

/**
 * Object id Azure DevOps expects as `oldObjectId` when a ref did not
 * exist before the update (and as `newObjectId` when deleting one).
 */
export const ZERO_OBJECT_ID = "0".repeat(40);

/**
 * Repository resolved from a name or id, reused for every later call
 * of the same workflow run
 */
export interface RepositoryRef {
  /** Canonical repository id (GUID) */
  id: string;
  /** Repository name */
  name: string;
  /** Fully qualified default branch (e.g. "refs/heads/main"), null for an empty repository */
  defaultBranchName: string | null;
  /** Browser URL of the repository */
  webUrl?: string;
}

/**
 * Snapshot of a branch tip at the moment it was read
 */
export interface BranchPointer {
  /** Fully qualified ref name, e.g. "refs/heads/main" */
  refName: string;
  /** Commit the ref pointed to when observed */
  objectId: string;
}

export type ChangeType = "add" | "edit";

/**
 * A single file write carried by a commit
 */
export interface FileChange {
  /** Repository path, e.g. "/docs/README.md" */
  path: string;
  /** Full new content of the file (text) */
  newContent: string;
  changeType: ChangeType;
}

export interface Commit {
  message: string;
  changes: ReadonlyArray<FileChange>;
}

/**
 * Outcome of a ref lookup: the ref either exists at some commit or it doesn't
 */
export type RefLookup = Data.TaggedEnum<{
  Found: { readonly pointer: BranchPointer };
  NotFound: { readonly refName: string };
}>;

export const RefLookup = Data.taggedEnum<RefLookup>();

/**
 * How the working branch was brought to the base tip
 * - created: it did not exist
 * - reset: it existed at another commit and was moved
 * - unchanged: it already pointed at the base tip
 */
export type BranchAction = "created" | "reset" | "unchanged";

export interface BranchPublication {
  action: BranchAction;
  /** Where the working branch points after the update */
  pointer: BranchPointer;
}

export interface PushResult {
  pushId: number;
  /** Commit the branch points to after the push */
  commitId: string;
  refName: string;
}

/**
 * Pull request created by the workflow
 */
export interface PullRequest {
  id: number;
  /** REST URL of the pull request resource */
  url: string;
  /** Browser URL to view the PR */
  webUrl?: string;
  sourceRef: string;
  targetRef: string;
  title: string;
  description: string;
}

/**
 * Input for publishing a single file change as a pull request
 */
export interface PublishFileChangeInput {
  /** Azure DevOps project name or id */
  project: string;
  /** Repository name or id */
  repository: string;
  /** File path inside the repository */
  filePath: string;
  /** Full new file content */
  newContent: string;
  pullRequestTitle: string;
  /** Branch to merge into, short ("main") or fully qualified */
  baseBranch: string;
  /** Branch that receives the commit, short or fully qualified */
  workingBranch: string;
  pullRequestDescription?: string;
  /** Defaults to "edit" */
  changeType?: ChangeType;
  /** Defaults to the pull request title */
  commitMessage?: string;
}

/**
 * Successful workflow outcome
 */
export interface WorkflowResult {
  repository: Pick<RepositoryRef, "id" | "name">;
  baseRef: string;
  sourceRef: string;
  branchAction: BranchAction;
  pushId: number;
  commitId: string;
  pullRequestId: number;
  url: string;
  webUrl?: string;
}

export type WorkflowStep =
  | "validateInput"
  | "resolveRepository"
  | "resolveBaseRef"
  | "publishBranch"
  | "pushCommit"
  | "openPullRequest";

/**
 * What a workflow run had already applied when it stopped
 */
export interface WorkflowProgress {
  baseRef: string;
  sourceRef: string;
  repository?: Pick<RepositoryRef, "id" | "name">;
  baseObjectId?: string;
  branchAction?: BranchAction;
  pushId?: number;
  commitId?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Catalog
// ─────────────────────────────────────────────────────────────────────────────

export interface ProjectSummary {
  id: string;
  name: string;
  state: string | null;
}

export interface RepositorySummary {
  id: string;
  name: string;
  webUrl: string | null;
  remoteUrl: string | null;
  defaultBranch: string | null;
}

export interface FileContent {
  path: string;
  /** Fully qualified branch the content was read from */
  branch: string;
  content: string;
}
