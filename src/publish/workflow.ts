import { Effect } from "effect";
import { pullRequestWebUrl } from "../azure-devops/endpoints.js";
import {
  InvalidInputError,
  PublishWorkflowError,
  type WorkflowStepError,
} from "../errors.js";
import { Transport } from "../Transport.js";
import type {
  PublishFileChangeInput,
  WorkflowProgress,
  WorkflowResult,
  WorkflowStep,
} from "../types.js";
import { publishBranch } from "./branch-publisher.js";
import { pushCommit } from "./commit-pusher.js";
import { openPullRequest } from "./pull-request-opener.js";
import { resolveRef, toBranchName, toBranchRef } from "./ref-resolver.js";
import { resolveRepository } from "./repository-locator.js";

/**
 * Attribute a step's failure to the step and record what was already applied
 */
const atStep =
  (step: WorkflowStep, progress: WorkflowProgress) =>
  <A, E extends WorkflowStepError, R>(self: Effect.Effect<A, E, R>) =>
    Effect.mapError(
      self,
      (cause) => new PublishWorkflowError({ step, cause, progress })
    );

/**
 * Reject blank names and a working branch equal to the base
 */
function validateInput(
  input: PublishFileChangeInput,
  baseRef: string,
  sourceRef: string
): InvalidInputError | undefined {
  const names = {
    project: input.project,
    repository: input.repository,
    filePath: input.filePath,
    pullRequestTitle: input.pullRequestTitle,
    baseBranch: toBranchName(baseRef),
    workingBranch: toBranchName(sourceRef),
  };
  for (const [field, value] of Object.entries(names)) {
    if (value.trim() === "") {
      return new InvalidInputError({ field, message: "must not be empty" });
    }
  }
  if (sourceRef === baseRef) {
    return new InvalidInputError({
      field: "workingBranch",
      message: `Working branch must differ from the base branch (${baseRef})`,
    });
  }
  return undefined;
}

/**
 * Publish a single file change as a pull request:
 *
 * 1. resolve the repository to its id
 * 2. resolve the base branch tip
 * 3. create or reset the working branch at that tip
 * 4. push one commit writing the file, guarded by the tip
 * 5. open a pull request from the working branch into the base
 *
 * Steps run strictly in order and the first failure ends the run.
 * Nothing already applied is rolled back; the error's `progress` says
 * what was (e.g. the push id when only the pull request failed).
 */
export const publishFileChangeAsPullRequest = (
  input: PublishFileChangeInput
): Effect.Effect<WorkflowResult, PublishWorkflowError, Transport> => {
  const baseRef = toBranchRef(input.baseBranch);
  const sourceRef = toBranchRef(input.workingBranch);
  const { project } = input;

  return Effect.gen(function* () {
    const started: WorkflowProgress = { baseRef, sourceRef };

    const invalid = validateInput(input, baseRef, sourceRef);
    if (invalid !== undefined) {
      return yield* new PublishWorkflowError({
        step: "validateInput",
        cause: invalid,
        progress: started,
      });
    }

    const repository = yield* resolveRepository(project, input.repository).pipe(
      atStep("resolveRepository", started)
    );
    const located: WorkflowProgress = {
      ...started,
      repository: { id: repository.id, name: repository.name },
    };
    yield* Effect.logInfo(`Resolved repository ${repository.name} (${repository.id})`);

    const baseObjectId = yield* resolveRef(project, repository.id, baseRef).pipe(
      atStep("resolveBaseRef", located)
    );
    const based: WorkflowProgress = { ...located, baseObjectId };

    const publication = yield* publishBranch(
      project,
      repository.id,
      sourceRef,
      baseObjectId
    ).pipe(atStep("publishBranch", based));
    const branched: WorkflowProgress = { ...based, branchAction: publication.action };
    yield* Effect.logInfo(
      `Working branch ${publication.action} at ${publication.pointer.objectId}`
    );

    const push = yield* pushCommit(
      project,
      repository.id,
      sourceRef,
      publication.pointer.objectId,
      {
        message: input.commitMessage ?? input.pullRequestTitle,
        changes: [
          {
            path: input.filePath,
            newContent: input.newContent,
            changeType: input.changeType ?? "edit",
          },
        ],
      }
    ).pipe(atStep("pushCommit", branched));
    const pushed: WorkflowProgress = {
      ...branched,
      pushId: push.pushId,
      commitId: push.commitId,
    };
    yield* Effect.logInfo(`Pushed ${push.commitId} (push ${push.pushId})`);

    const pr = yield* openPullRequest(
      project,
      repository.id,
      sourceRef,
      baseRef,
      input.pullRequestTitle,
      input.pullRequestDescription
    ).pipe(atStep("openPullRequest", pushed));
    yield* Effect.logInfo(`Opened pull request ${pr.id}`);

    const transport = yield* Transport;
    return {
      repository: { id: repository.id, name: repository.name },
      baseRef,
      sourceRef,
      branchAction: publication.action,
      pushId: push.pushId,
      commitId: push.commitId,
      pullRequestId: pr.id,
      url: pr.url,
      webUrl:
        pr.webUrl ??
        pullRequestWebUrl(transport.location, project, repository.name, pr.id),
    } satisfies WorkflowResult;
  }).pipe(
    Effect.annotateLogs({ project, repository: input.repository, sourceRef }),
    Effect.withLogSpan("publishFileChange")
  );
};
