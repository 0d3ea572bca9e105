import { Effect } from "effect";
import {
  itemsUrl,
  projectsUrl,
  repositoriesUrl,
} from "./azure-devops/endpoints.js";
import {
  GitItem,
  GitRepositoryList,
  TeamProjectList,
  decodeResponse,
} from "./azure-devops/schemas.js";
import { type CatalogError, NotFoundError, type TransportError } from "./errors.js";
import { toBranchName, toBranchRef } from "./publish/ref-resolver.js";
import { Transport } from "./Transport.js";
import type { FileContent, ProjectSummary, RepositorySummary } from "./types.js";

/**
 * List the projects of the organization
 */
export const listProjects = (): Effect.Effect<
  ProjectSummary[],
  TransportError,
  Transport
> =>
  Effect.gen(function* () {
    const transport = yield* Transport;
    const url = projectsUrl(transport.location);
    const body = yield* transport.request("GET", url);
    const { value } = yield* decodeResponse(TeamProjectList, url)(body);

    return value.map((project) => ({
      id: project.id,
      name: project.name,
      state: project.state ?? null,
    }));
  });

/**
 * List the Git repositories of a project
 */
export const listRepositories = (
  project: string
): Effect.Effect<RepositorySummary[], CatalogError, Transport> =>
  Effect.gen(function* () {
    const transport = yield* Transport;
    const url = repositoriesUrl(transport.location, project);
    const body = yield* transport.request("GET", url).pipe(
      Effect.mapError((error) =>
        error._tag === "RemoteApiError" && error.statusCode === 404
          ? new NotFoundError({ resource: "project", identifier: project })
          : error
      )
    );
    const { value } = yield* decodeResponse(GitRepositoryList, url)(body);

    return value.map((repo) => ({
      id: repo.id,
      name: repo.name,
      webUrl: repo.webUrl ?? null,
      remoteUrl: repo.remoteUrl ?? null,
      defaultBranch: repo.defaultBranch ?? null,
    }));
  });

/**
 * Read a text file at the tip of a branch
 */
export const getFileContent = (
  project: string,
  repository: string,
  path: string,
  branch = "main"
): Effect.Effect<FileContent, CatalogError, Transport> =>
  Effect.gen(function* () {
    const transport = yield* Transport;
    const branchRef = toBranchRef(branch);
    const url = itemsUrl(
      transport.location,
      project,
      repository,
      path,
      toBranchName(branchRef)
    );
    const body = yield* transport.request("GET", url).pipe(
      Effect.mapError((error) =>
        error._tag === "RemoteApiError" && error.statusCode === 404
          ? new NotFoundError({
              resource: "item",
              identifier: `${repository}:${path}@${branchRef}`,
            })
          : error
      )
    );
    const item = yield* decodeResponse(GitItem, url)(body);

    return { path, branch: branchRef, content: item.content ?? "" };
  });
