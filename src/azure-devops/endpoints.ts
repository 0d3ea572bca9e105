import type { ApiLocation } from "../Transport.js";

/**
 * Build an Azure DevOps REST URL from raw path segments. Every segment is
 * URI-encoded and the api-version is appended last.
 */
function apiUrl(
  location: ApiLocation,
  segments: ReadonlyArray<string>,
  query: Record<string, string> = {}
): string {
  const path = segments.map(encodeURIComponent).join("/");
  const url = new URL(`${location.orgUrl}/${path}`);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, value);
  }
  url.searchParams.set("api-version", location.apiVersion);
  return url.toString();
}

const gitRepositories = (project: string) => [project, "_apis", "git", "repositories"];

export const projectsUrl = (location: ApiLocation) =>
  apiUrl(location, ["_apis", "projects"]);

export const repositoriesUrl = (location: ApiLocation, project: string) =>
  apiUrl(location, gitRepositories(project));

export const repositoryUrl = (
  location: ApiLocation,
  project: string,
  repository: string
) => apiUrl(location, [...gitRepositories(project), repository]);

/**
 * Refs collection; with a filter, lists refs whose name (without the
 * leading "refs/") starts with it
 */
export const refsUrl = (
  location: ApiLocation,
  project: string,
  repositoryId: string,
  filter?: string
) =>
  apiUrl(
    location,
    [...gitRepositories(project), repositoryId, "refs"],
    filter === undefined ? {} : { filter }
  );

export const pushesUrl = (
  location: ApiLocation,
  project: string,
  repositoryId: string
) => apiUrl(location, [...gitRepositories(project), repositoryId, "pushes"]);

export const pullRequestsUrl = (
  location: ApiLocation,
  project: string,
  repositoryId: string
) =>
  apiUrl(location, [...gitRepositories(project), repositoryId, "pullrequests"]);

export const itemsUrl = (
  location: ApiLocation,
  project: string,
  repository: string,
  path: string,
  branchName: string
) =>
  apiUrl(location, [...gitRepositories(project), repository, "items"], {
    path,
    includeContent: "true",
    "versionDescriptor.versionType": "branch",
    "versionDescriptor.version": branchName,
  });

/**
 * Browser URL of a pull request
 */
export const pullRequestWebUrl = (
  location: ApiLocation,
  project: string,
  repositoryName: string,
  pullRequestId: number
) =>
  `${location.orgUrl}/${encodeURIComponent(project)}/_git/${encodeURIComponent(repositoryName)}/pullrequest/${pullRequestId}`;
