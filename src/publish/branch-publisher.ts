import { Effect } from "effect";
import { refsUrl } from "../azure-devops/endpoints.js";
import {
  GitRefUpdateResultList,
  decodeResponse,
} from "../azure-devops/schemas.js";
import {
  ConcurrencyConflictError,
  MalformedResponseError,
  type PublishBranchError,
  RefUpdateRejectedError,
  previewPayload,
  remoteMessage,
} from "../errors.js";
import { Transport } from "../Transport.js";
import {
  type BranchAction,
  type BranchPublication,
  type RefLookup,
  ZERO_OBJECT_ID,
} from "../types.js";
import { lookupRef } from "./ref-resolver.js";

interface RefUpdate {
  name: string;
  oldObjectId: string;
  newObjectId: string;
}

// GitRefUpdateStatus.StaleOldObjectId, serialized by name or by value
const STALE_OLD_OBJECT_ID = { name: "staleOldObjectId", value: 2 } as const;

function isStaleObjectId(status: string | number): boolean {
  return (
    status === STALE_OLD_OBJECT_ID.name || status === STALE_OLD_OBJECT_ID.value
  );
}

/**
 * Decide which update brings the branch to the base tip
 */
export function planBranchUpdate(
  lookup: RefLookup,
  baseObjectId: string
): { action: BranchAction; oldObjectId: string } {
  switch (lookup._tag) {
    case "Found":
      return {
        action:
          lookup.pointer.objectId === baseObjectId ? "unchanged" : "reset",
        oldObjectId: lookup.pointer.objectId,
      };
    case "NotFound":
      return { action: "created", oldObjectId: ZERO_OBJECT_ID };
  }
}

/**
 * Submit one ref update guarded by its old object id
 */
const updateRef = (project: string, repositoryId: string, update: RefUpdate) =>
  Effect.gen(function* () {
    const transport = yield* Transport;
    const url = refsUrl(transport.location, project, repositoryId);

    const body = yield* transport.request("POST", url, [update]).pipe(
      Effect.mapError((error) =>
        error._tag === "RemoteApiError" && error.statusCode === 409
          ? new ConcurrencyConflictError({
              operation: "updateRef",
              refName: update.name,
              expectedObjectId: update.oldObjectId,
              message: remoteMessage(error.body),
            })
          : error
      )
    );
    const { value } = yield* decodeResponse(GitRefUpdateResultList, url)(body);

    const result = value.find((r) => r.name === update.name) ?? value[0];
    if (result === undefined) {
      return yield* new MalformedResponseError({
        url,
        payload: previewPayload(body),
        message: "Ref update response contains no result",
      });
    }
    if (result.success) return;

    const message =
      result.customMessage ?? `Update of ${update.name} was not applied`;
    if (isStaleObjectId(result.updateStatus)) {
      return yield* new ConcurrencyConflictError({
        operation: "updateRef",
        refName: update.name,
        expectedObjectId: update.oldObjectId,
        message,
      });
    }
    return yield* new RefUpdateRejectedError({
      refName: update.name,
      updateStatus: String(result.updateStatus),
      message,
    });
  });

/**
 * Make `refName` point at `baseObjectId`: create it when absent, otherwise
 * force-reset it from its current tip. The update is always sent with the
 * tip just observed, so a branch moved in between is reported as a conflict.
 */
export const publishBranch = (
  project: string,
  repositoryId: string,
  refName: string,
  baseObjectId: string
): Effect.Effect<BranchPublication, PublishBranchError, Transport> =>
  Effect.gen(function* () {
    const lookup = yield* lookupRef(project, repositoryId, refName);
    const { action, oldObjectId } = planBranchUpdate(lookup, baseObjectId);

    yield* updateRef(project, repositoryId, {
      name: refName,
      oldObjectId,
      newObjectId: baseObjectId,
    });
    yield* Effect.logDebug(`Branch ${refName} ${action} at ${baseObjectId}`);

    return { action, pointer: { refName, objectId: baseObjectId } };
  });
