import { Effect } from "effect";
import { repositoryUrl } from "../azure-devops/endpoints.js";
import { GitRepository, decodeResponse } from "../azure-devops/schemas.js";
import { NotFoundError, type ResolveRepositoryError } from "../errors.js";
import { Transport } from "../Transport.js";
import type { RepositoryRef } from "../types.js";

/**
 * Resolve a repository name or id to its canonical id and metadata.
 * Lookup is delegated to a single GET; duplicates are not disambiguated.
 */
export const resolveRepository = (
  project: string,
  repository: string
): Effect.Effect<RepositoryRef, ResolveRepositoryError, Transport> =>
  Effect.gen(function* () {
    const transport = yield* Transport;
    const url = repositoryUrl(transport.location, project, repository);

    const body = yield* transport.request("GET", url).pipe(
      Effect.mapError((error) =>
        error._tag === "RemoteApiError" && error.statusCode === 404
          ? new NotFoundError({
              resource: "repository",
              identifier: `${project}/${repository}`,
            })
          : error
      )
    );
    const repo = yield* decodeResponse(GitRepository, url)(body);

    return {
      id: repo.id,
      name: repo.name,
      defaultBranchName: repo.defaultBranch ?? null,
      ...(repo.webUrl !== undefined && { webUrl: repo.webUrl }),
    } satisfies RepositoryRef;
  });
