import { Config, Redacted } from "effect";

/**
 * Personal Access Token, sent as HTTP Basic
 */
export interface PatCredential {
  type: "pat";
  token: string;
}

/**
 * OAuth / Entra ID access token, sent as a Bearer token
 */
export interface BearerCredential {
  type: "bearer";
  token: string;
}

export type Credential = PatCredential | BearerCredential;

/**
 * Azure DevOps connection configuration
 */
export interface AzureDevOpsConfig {
  /** Organization URL (e.g., "https://dev.azure.com/myorg") */
  orgUrl: string;
  credential: Credential;
  /** Bound on every outbound request (defaults to 60 seconds) */
  timeoutMs?: number;
  /**
   * Product named in the User-Agent header, as "name/version"
   * (defaults to "azure-repos-publisher/<version>")
   */
  userAgent?: string;
  /** REST api-version query parameter (defaults to "7.1") */
  apiVersion?: string;
}

export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_API_VERSION = "7.1";
export const DEFAULT_USER_AGENT = "azure-repos-publisher/0.1.0";

export type ResolvedConfig = Required<AzureDevOpsConfig>;

/**
 * Apply defaults and strip trailing slashes from the organization URL
 */
export function resolveConfig(config: AzureDevOpsConfig): ResolvedConfig {
  return {
    orgUrl: config.orgUrl.replace(/\/+$/, ""),
    credential: config.credential,
    timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
    apiVersion: config.apiVersion ?? DEFAULT_API_VERSION,
  };
}

/**
 * Configuration read from AZDO_ORG_URL, AZDO_PAT and AZDO_TIMEOUT_MS
 */
export const AzureDevOpsConfigFromEnv: Config.Config<AzureDevOpsConfig> =
  Config.all({
    orgUrl: Config.string("AZDO_ORG_URL"),
    token: Config.redacted("AZDO_PAT"),
    timeoutMs: Config.integer("AZDO_TIMEOUT_MS").pipe(
      Config.withDefault(DEFAULT_TIMEOUT_MS)
    ),
  }).pipe(
    Config.map(
      ({ orgUrl, token, timeoutMs }): AzureDevOpsConfig => ({
        orgUrl,
        credential: { type: "pat", token: Redacted.value(token) },
        timeoutMs,
      })
    )
  );
