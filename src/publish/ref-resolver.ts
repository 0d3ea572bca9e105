import { Effect } from "effect";
import { refsUrl } from "../azure-devops/endpoints.js";
import { GitRefList, decodeResponse } from "../azure-devops/schemas.js";
import {
  AmbiguousRefError,
  InvalidInputError,
  type LookupRefError,
  RefNotFoundError,
  type ResolveRefError,
} from "../errors.js";
import { Transport } from "../Transport.js";
import { RefLookup } from "../types.js";

const REFS_PREFIX = "refs/";
const HEADS_PREFIX = "refs/heads/";

/**
 * Qualify a branch name: "main" -> "refs/heads/main".
 * Names already starting with "refs/" are returned as-is.
 */
export function toBranchRef(branch: string): string {
  return branch.startsWith(REFS_PREFIX) ? branch : `${HEADS_PREFIX}${branch}`;
}

/**
 * Extract branch name from full ref path
 * e.g., "refs/heads/main" -> "main"
 */
export function toBranchName(ref: string): string {
  return ref.startsWith(HEADS_PREFIX) ? ref.slice(HEADS_PREFIX.length) : ref;
}

/**
 * Look up the current tip of a fully qualified ref.
 *
 * The refs endpoint filters by prefix, so "refs/heads/main" also lists
 * "refs/heads/main-old". Only a candidate whose name matches exactly counts.
 */
export const lookupRef = (
  project: string,
  repositoryId: string,
  refName: string
): Effect.Effect<RefLookup, LookupRefError, Transport> =>
  Effect.gen(function* () {
    if (!refName.startsWith(REFS_PREFIX)) {
      return yield* new InvalidInputError({
        field: "refName",
        message: `Ref name must be fully qualified (refs/...): ${refName}`,
      });
    }

    const transport = yield* Transport;
    const url = refsUrl(
      transport.location,
      project,
      repositoryId,
      refName.slice(REFS_PREFIX.length)
    );
    const body = yield* transport.request("GET", url);
    const { value } = yield* decodeResponse(GitRefList, url)(body);

    const matches = value.filter((ref) => ref.name === refName);
    if (matches.length > 1) {
      return yield* new AmbiguousRefError({
        repositoryId,
        refName,
        matches: matches.map((ref) => ref.objectId),
      });
    }

    const [match] = matches;
    if (match === undefined) return RefLookup.NotFound({ refName });
    return RefLookup.Found({ pointer: { refName, objectId: match.objectId } });
  });

/**
 * Resolve a fully qualified ref to the commit it points at
 */
export const resolveRef = (
  project: string,
  repositoryId: string,
  refName: string
): Effect.Effect<string, ResolveRefError, Transport> =>
  Effect.gen(function* () {
    const lookup = yield* lookupRef(project, repositoryId, refName);
    if (lookup._tag === "NotFound") {
      return yield* new RefNotFoundError({ repositoryId, refName });
    }
    return lookup.pointer.objectId;
  });
