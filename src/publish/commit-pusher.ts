import { Effect } from "effect";
import { pushesUrl } from "../azure-devops/endpoints.js";
import { GitPush, decodeResponse } from "../azure-devops/schemas.js";
import {
  ConcurrencyConflictError,
  InvalidInputError,
  MalformedResponseError,
  type PushCommitError,
  previewPayload,
  remoteMessage,
} from "../errors.js";
import { Transport } from "../Transport.js";
import type { Commit, PushResult } from "../types.js";

/**
 * Azure item paths are rooted: "docs/a.md" -> "/docs/a.md"
 */
export function toItemPath(path: string): string {
  return path.startsWith("/") ? path : `/${path}`;
}

/**
 * Request body for a push of one commit onto `refName`
 */
export function toPushPayload(
  refName: string,
  expectedObjectId: string,
  commit: Commit
) {
  return {
    refUpdates: [{ name: refName, oldObjectId: expectedObjectId }],
    commits: [
      {
        comment: commit.message,
        changes: commit.changes.map((change) => ({
          changeType: change.changeType,
          item: { path: toItemPath(change.path) },
          newContent: { content: change.newContent, contentType: "rawtext" },
        })),
      },
    ],
  };
}

/**
 * Push one commit onto `refName`. The server rejects the push (HTTP 409)
 * when the branch no longer points at `expectedObjectId`.
 */
export const pushCommit = (
  project: string,
  repositoryId: string,
  refName: string,
  expectedObjectId: string,
  commit: Commit
): Effect.Effect<PushResult, PushCommitError, Transport> =>
  Effect.gen(function* () {
    if (commit.changes.length === 0) {
      return yield* new InvalidInputError({
        field: "commit.changes",
        message: "A commit needs at least one file change",
      });
    }

    const transport = yield* Transport;
    const url = pushesUrl(transport.location, project, repositoryId);

    const body = yield* transport
      .request("POST", url, toPushPayload(refName, expectedObjectId, commit))
      .pipe(
        Effect.mapError((error) =>
          error._tag === "RemoteApiError" && error.statusCode === 409
            ? new ConcurrencyConflictError({
                operation: "push",
                refName,
                expectedObjectId,
                message: remoteMessage(error.body),
              })
            : error
        )
      );
    const push = yield* decodeResponse(GitPush, url)(body);

    const commitId =
      push.refUpdates?.find((update) => update.name === refName)?.newObjectId ??
      push.commits?.[0]?.commitId;
    if (commitId === undefined) {
      return yield* new MalformedResponseError({
        url,
        payload: previewPayload(body),
        message: "Push response does not report the new commit",
      });
    }

    return { pushId: push.pushId, commitId, refName };
  });
