import { Data } from "effect";
import type { WorkflowProgress, WorkflowStep } from "./types.js";

/**
 * Credential missing, invalid, expired, or lacking scopes (HTTP 401/403)
 */
export class AuthenticationError extends Data.TaggedError(
  "AuthenticationError"
)<{
  message: string;
  url?: string;
  statusCode?: number;
}> {}

/**
 * Requested resource was not found
 */
export class NotFoundError extends Data.TaggedError("NotFoundError")<{
  resource: "project" | "repository" | "item";
  identifier: string;
}> {}

/**
 * No ref carries the requested name
 */
export class RefNotFoundError extends Data.TaggedError("RefNotFoundError")<{
  repositoryId: string;
  refName: string;
}> {}

/**
 * More than one ref carries the requested name
 */
export class AmbiguousRefError extends Data.TaggedError("AmbiguousRefError")<{
  repositoryId: string;
  refName: string;
  /** Object ids of every matching ref */
  matches: ReadonlyArray<string>;
}> {}

/**
 * The ref moved since it was last observed (stale old object id)
 */
export class ConcurrencyConflictError extends Data.TaggedError(
  "ConcurrencyConflictError"
)<{
  operation: "updateRef" | "push";
  refName: string;
  /** Object id the request expected the ref to be at */
  expectedObjectId: string;
  message: string;
}> {}

/**
 * Ref update refused for a reason other than a stale object id
 * (permissions, locks, policies, invalid names)
 */
export class RefUpdateRejectedError extends Data.TaggedError(
  "RefUpdateRejectedError"
)<{
  refName: string;
  updateStatus: string;
  message: string;
}> {}

/**
 * Response body could not be parsed or lacks required fields
 */
export class MalformedResponseError extends Data.TaggedError(
  "MalformedResponseError"
)<{
  url: string;
  /** Raw payload, truncated */
  payload: string;
  message: string;
}> {}

/**
 * Any other non-2xx response
 */
export class RemoteApiError extends Data.TaggedError("RemoteApiError")<{
  statusCode: number;
  url: string;
  /** Parsed JSON body, or the raw text when it isn't JSON */
  body: unknown;
}> {}

/**
 * The request never produced a response (DNS, connection reset, TLS)
 */
export class NetworkError extends Data.TaggedError("NetworkError")<{
  url: string;
  message: string;
  cause?: unknown;
}> {}

export class TimeoutError extends Data.TaggedError("TimeoutError")<{
  url: string;
  timeoutMs: number;
}> {}

/**
 * Arguments rejected before any request is sent
 */
export class InvalidInputError extends Data.TaggedError("InvalidInputError")<{
  field: string;
  message: string;
}> {}

/**
 * Errors produced by the transport itself
 */
export type TransportError =
  | AuthenticationError
  | MalformedResponseError
  | NetworkError
  | RemoteApiError
  | TimeoutError;

export type ResolveRepositoryError = NotFoundError | TransportError;

export type LookupRefError = InvalidInputError | AmbiguousRefError | TransportError;

export type ResolveRefError = LookupRefError | RefNotFoundError;

export type PublishBranchError =
  | LookupRefError
  | ConcurrencyConflictError
  | RefUpdateRejectedError;

export type PushCommitError =
  | InvalidInputError
  | ConcurrencyConflictError
  | TransportError;

export type OpenPullRequestError = InvalidInputError | TransportError;

export type CatalogError = NotFoundError | TransportError;

/**
 * Any error a single workflow step can fail with
 */
export type WorkflowStepError =
  | ResolveRepositoryError
  | ResolveRefError
  | PublishBranchError
  | PushCommitError
  | OpenPullRequestError;

/**
 * Workflow failure: the step that failed, its error, and what had
 * already been applied (nothing is rolled back)
 */
export class PublishWorkflowError extends Data.TaggedError(
  "PublishWorkflowError"
)<{
  step: WorkflowStep;
  cause: WorkflowStepError;
  progress: WorkflowProgress;
}> {}

/**
 * Union of all possible errors
 */
export type AzureReposError = WorkflowStepError | CatalogError | PublishWorkflowError;

const PAYLOAD_PREVIEW_LIMIT = 500;

/**
 * Truncated textual preview of a response payload
 */
export function previewPayload(payload: unknown): string {
  let text: string;
  if (payload === undefined) {
    text = "";
  } else if (typeof payload === "string") {
    text = payload;
  } else {
    text = JSON.stringify(payload);
  }
  return text.length > PAYLOAD_PREVIEW_LIMIT
    ? `${text.slice(0, PAYLOAD_PREVIEW_LIMIT)}…`
    : text;
}

/**
 * Pull the human message out of an Azure DevOps error body
 * ({ "message": "TF401028: ..." }), falling back to the raw payload
 */
export function remoteMessage(body: unknown): string {
  if (
    typeof body === "object" &&
    body !== null &&
    "message" in body &&
    typeof body.message === "string"
  ) {
    return body.message;
  }
  return previewPayload(body);
}

/**
 * One-line description of an error
 */
export function describeError(error: AzureReposError): string {
  switch (error._tag) {
    case "AuthenticationError":
      return `Authentication failed: ${error.message}`;
    case "NotFoundError":
      return `${error.resource} not found: ${error.identifier}`;
    case "RefNotFoundError":
      return `Ref ${error.refName} not found in repository ${error.repositoryId}`;
    case "AmbiguousRefError":
      return `Ref ${error.refName} is ambiguous in repository ${error.repositoryId} (${error.matches.length} matches)`;
    case "ConcurrencyConflictError":
      return `Concurrent update of ${error.refName} during ${error.operation} (expected ${error.expectedObjectId}): ${error.message}`;
    case "RefUpdateRejectedError":
      return `Update of ${error.refName} rejected (${error.updateStatus}): ${error.message}`;
    case "MalformedResponseError":
      return `Malformed response from ${error.url}: ${error.message}`;
    case "RemoteApiError":
      return `Azure DevOps API error ${error.statusCode} at ${error.url}: ${remoteMessage(error.body)}`;
    case "NetworkError":
      return `Request to ${error.url} failed: ${error.message}`;
    case "TimeoutError":
      return `Request to ${error.url} timed out after ${error.timeoutMs}ms`;
    case "InvalidInputError":
      return `Invalid ${error.field}: ${error.message}`;
    case "PublishWorkflowError":
      return `${error.step} failed: ${describeError(error.cause)}`;
  }
}
