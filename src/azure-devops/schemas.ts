import { Effect, Schema } from "effect";
import { MalformedResponseError, previewPayload } from "../errors.js";

// Only the fields this library reads are declared; extra fields pass through.

export const GitRepository = Schema.Struct({
  id: Schema.String,
  name: Schema.String,
  defaultBranch: Schema.optional(Schema.String),
  webUrl: Schema.optional(Schema.String),
  remoteUrl: Schema.optional(Schema.String),
});

export const GitRepositoryList = Schema.Struct({
  value: Schema.Array(GitRepository),
});

export const GitRef = Schema.Struct({
  name: Schema.String,
  objectId: Schema.String,
});

export const GitRefList = Schema.Struct({
  value: Schema.Array(GitRef),
});

export const GitRefUpdateResult = Schema.Struct({
  name: Schema.String,
  success: Schema.Boolean,
  /** Enum name ("staleOldObjectId") or its numeric value */
  updateStatus: Schema.Union(Schema.String, Schema.Number),
  customMessage: Schema.optional(Schema.NullOr(Schema.String)),
});

export const GitRefUpdateResultList = Schema.Struct({
  value: Schema.Array(GitRefUpdateResult),
});

export const GitPush = Schema.Struct({
  pushId: Schema.Number,
  refUpdates: Schema.optional(
    Schema.Array(
      Schema.Struct({
        name: Schema.String,
        newObjectId: Schema.optional(Schema.String),
      })
    )
  ),
  commits: Schema.optional(
    Schema.Array(Schema.Struct({ commitId: Schema.String }))
  ),
});

export const GitPullRequest = Schema.Struct({
  pullRequestId: Schema.Number,
  url: Schema.String,
  sourceRefName: Schema.String,
  targetRefName: Schema.String,
  title: Schema.String,
  description: Schema.optional(Schema.String),
  _links: Schema.optional(
    Schema.Struct({
      web: Schema.optional(Schema.Struct({ href: Schema.String })),
    })
  ),
});

export const TeamProjectList = Schema.Struct({
  value: Schema.Array(
    Schema.Struct({
      id: Schema.String,
      name: Schema.String,
      state: Schema.optional(Schema.String),
    })
  ),
});

export const GitItem = Schema.Struct({
  path: Schema.String,
  content: Schema.optional(Schema.String),
});

/**
 * Decode a response body, failing with MalformedResponseError when it
 * does not have the expected shape
 */
export const decodeResponse =
  <A, I>(schema: Schema.Schema<A, I>, url: string) =>
  (body: unknown): Effect.Effect<A, MalformedResponseError> =>
    Schema.decodeUnknown(schema)(body).pipe(
      Effect.mapError(
        (error) =>
          new MalformedResponseError({
            url,
            payload: previewPayload(body),
            message: `Unexpected response shape: ${error.message}`,
          })
      )
    );
