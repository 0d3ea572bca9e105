import * as azdev from "azure-devops-node-api";
import { Context, Duration, Effect, Layer } from "effect";
import {
  type AzureDevOpsConfig,
  type Credential,
  type ResolvedConfig,
  resolveConfig,
} from "./config.js";
import {
  AuthenticationError,
  MalformedResponseError,
  NetworkError,
  RemoteApiError,
  TimeoutError,
  type TransportError,
  previewPayload,
} from "./errors.js";

export type HttpMethod = "GET" | "POST" | "PATCH" | "PUT" | "DELETE";

/**
 * Response surface the transport reads from the low-level client
 */
export interface HttpResponse {
  readonly message: { readonly statusCode?: number | undefined };
  readBody(): Promise<string>;
}

/**
 * Low-level HTTP client. The Azure DevOps node API connection's client
 * satisfies it; tests substitute an in-process fake.
 */
export interface HttpRequester {
  request(
    verb: string,
    requestUrl: string,
    data: string,
    headers: Record<string, string>
  ): Promise<HttpResponse>;
}

/**
 * Organization URL and api-version every endpoint is built from
 */
export interface ApiLocation {
  readonly orgUrl: string;
  readonly apiVersion: string;
}

/**
 * Authenticated JSON transport
 */
export interface TransportService {
  readonly location: ApiLocation;

  /**
   * Send one request and parse the JSON reply.
   * Succeeds with `undefined` when the reply body is empty.
   */
  request(
    method: HttpMethod,
    url: string,
    body?: unknown
  ): Effect.Effect<unknown, TransportError>;
}

/**
 * Effect Context tag for TransportService
 */
export const Transport = Context.GenericTag<TransportService>("Transport");
export type Transport = TransportService;

/**
 * Request handler that attaches the Authorization header for a credential
 */
export function authHandlerFor(credential: Credential) {
  switch (credential.type) {
    case "pat":
      return azdev.getPersonalAccessTokenHandler(credential.token);
    case "bearer":
      return azdev.getBearerHandler(credential.token);
  }
}

/**
 * "name/version" -> WebApi request settings. The client reports
 * "name/version (azure-devops-node-api <version>; <os>)" as its user agent.
 */
export function productOf(userAgent: string) {
  const slash = userAgent.indexOf("/");
  return slash < 0
    ? { productName: userAgent, productVersion: "" }
    : {
        productName: userAgent.slice(0, slash),
        productVersion: userAgent.slice(slash + 1),
      };
}

function createConnection(config: ResolvedConfig): HttpRequester {
  const connection = new azdev.WebApi(
    config.orgUrl,
    authHandlerFor(config.credential),
    { socketTimeout: config.timeoutMs },
    productOf(config.userAgent)
  );
  return connection.rest.client;
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Turn a raw status/body pair into a parsed body or a typed error
 */
function interpretResponse(
  url: string,
  statusCode: number,
  text: string
): Effect.Effect<unknown, TransportError> {
  const parsed = text.trim() === "" ? undefined : parseJson(text);

  if (statusCode >= 200 && statusCode < 300) {
    if (parsed === undefined) return Effect.succeed(undefined);
    if (parsed.ok) return Effect.succeed(parsed.value);
    return Effect.fail(
      new MalformedResponseError({
        url,
        payload: previewPayload(text),
        message: "Response body is not valid JSON",
      })
    );
  }

  const body = parsed?.ok ? parsed.value : text;

  if (statusCode === 401 || statusCode === 403) {
    return Effect.fail(
      new AuthenticationError({
        message: `Azure DevOps rejected the credential (HTTP ${statusCode})`,
        url,
        statusCode,
      })
    );
  }

  return Effect.fail(new RemoteApiError({ statusCode, url, body }));
}

/**
 * Create a transport bound to one organization and credential
 */
export function makeTransport(
  config: AzureDevOpsConfig,
  client?: HttpRequester
): TransportService {
  const settings = resolveConfig(config);
  const http = client ?? createConnection(settings);
  const hasCredential = settings.credential.token.trim() !== "";

  const headers = {
    "Content-Type": "application/json",
    Accept: "application/json",
  };

  return {
    location: { orgUrl: settings.orgUrl, apiVersion: settings.apiVersion },

    request: (method, url, body) =>
      Effect.gen(function* () {
        if (!hasCredential) {
          return yield* new AuthenticationError({
            message: "No Azure DevOps credential configured",
            url,
          });
        }

        const startedAt = Date.now();
        const { statusCode, text } = yield* Effect.tryPromise({
          try: async () => {
            const response = await http.request(
              method,
              url,
              body === undefined ? "" : JSON.stringify(body),
              { ...headers }
            );
            return {
              statusCode: response.message.statusCode ?? 0,
              text: await response.readBody(),
            };
          },
          catch: (e) =>
            new NetworkError({
              url,
              message: e instanceof Error ? e.message : String(e),
              cause: e,
            }),
        }).pipe(
          Effect.timeoutFail({
            duration: Duration.millis(settings.timeoutMs),
            onTimeout: () =>
              new TimeoutError({ url, timeoutMs: settings.timeoutMs }),
          })
        );

        yield* Effect.logDebug(`${method} ${url} -> ${statusCode}`).pipe(
          Effect.annotateLogs("durationMs", Date.now() - startedAt)
        );

        return yield* interpretResponse(url, statusCode, text);
      }),
  };
}

/**
 * Layer providing a Transport for the given configuration
 */
export function TransportLayer(
  config: AzureDevOpsConfig,
  client?: HttpRequester
) {
  return Layer.sync(Transport, () => makeTransport(config, client));
}
