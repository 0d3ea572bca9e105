import { Effect } from "effect";
import { pullRequestsUrl } from "../azure-devops/endpoints.js";
import { GitPullRequest, decodeResponse } from "../azure-devops/schemas.js";
import { InvalidInputError, type OpenPullRequestError } from "../errors.js";
import { Transport } from "../Transport.js";
import type { PullRequest } from "../types.js";

/**
 * Open a pull request from `sourceRefName` into `targetRefName`.
 * Duplicate PRs are left to the server's own policy.
 */
export const openPullRequest = (
  project: string,
  repositoryId: string,
  sourceRefName: string,
  targetRefName: string,
  title: string,
  description = ""
): Effect.Effect<PullRequest, OpenPullRequestError, Transport> =>
  Effect.gen(function* () {
    if (sourceRefName === targetRefName) {
      return yield* new InvalidInputError({
        field: "sourceRefName",
        message: `Source and target are the same ref: ${sourceRefName}`,
      });
    }

    const transport = yield* Transport;
    const url = pullRequestsUrl(transport.location, project, repositoryId);
    const body = yield* transport.request("POST", url, {
      sourceRefName,
      targetRefName,
      title,
      description,
    });
    const pr = yield* decodeResponse(GitPullRequest, url)(body);
    const webUrl = pr._links?.web?.href;

    return {
      id: pr.pullRequestId,
      url: pr.url,
      ...(webUrl !== undefined && { webUrl }),
      sourceRef: pr.sourceRefName,
      targetRef: pr.targetRefName,
      title: pr.title,
      description: pr.description ?? "",
    } satisfies PullRequest;
  });
