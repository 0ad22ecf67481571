/**
 * OAuth 2.0 for the Fitbit Web API.
 * Authorization-code URL, code exchange, and a token supplier that refreshes
 * the access token shortly before it expires.
 */

import type { OAuth2Config, OAuth2Token, ErrorCode } from "../types/index.js";
import { errorMessage, FitbitError } from "./errors.js";
import { fitbitLogger } from "./logger.js";
import type { Logger } from "./logger.js";

export const DEFAULT_AUTH_URL = "https://www.fitbit.com/oauth2/authorize";
export const DEFAULT_TOKEN_URL = "https://api.fitbit.com/oauth2/token";
export const DEFAULT_SCOPES: readonly string[] = ["activity", "profile"];
const TOKEN_REFRESH_BUFFER_MS = 5 * 60 * 1000; // Refresh 5 min before expiry
const REQUEST_TIMEOUT_MS = 10000;

/**
 * Yields a valid bearer credential on demand.
 */
export interface TokenSupplier {
  getAccessToken(): Promise<string>;
}

export class StaticTokenSupplier implements TokenSupplier {
  constructor(private readonly accessToken: string) {}

  async getAccessToken(): Promise<string> {
    return this.accessToken;
  }
}

export interface TokenEndpointOptions {
  fetch?: typeof fetch;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function basicAuth(config: OAuth2Config): string {
  return Buffer.from(`${config.clientId}:${config.clientSecret}`).toString("base64");
}

export function parseTokenResponse(data: unknown): OAuth2Token {
  if (!isRecord(data)) {
    throw new Error("Invalid Fitbit token response: body is not an object");
  }
  if (typeof data.access_token !== "string") {
    throw new Error("Invalid Fitbit token response: missing access_token");
  }
  if (data.refresh_token !== undefined && typeof data.refresh_token !== "string") {
    throw new Error("Invalid Fitbit token response: refresh_token is not a string");
  }
  if (data.expires_in !== undefined && typeof data.expires_in !== "number") {
    throw new Error("Invalid Fitbit token response: expires_in is not a number");
  }
  return {
    accessToken: data.access_token,
    ...(typeof data.refresh_token === "string" && { refreshToken: data.refresh_token }),
    ...(typeof data.token_type === "string" && { tokenType: data.token_type }),
    ...(typeof data.expires_in === "number" && {
      expiresAt: new Date(Date.now() + data.expires_in * 1000),
    }),
  };
}

async function postTokenRequest(
  config: OAuth2Config,
  params: URLSearchParams,
  failureCode: ErrorCode,
  fetchImpl: typeof fetch,
  log: Logger,
): Promise<OAuth2Token> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

  try {
    const response = await fetchImpl(config.tokenUrl ?? DEFAULT_TOKEN_URL, {
      method: "POST",
      headers: {
        Authorization: `Basic ${basicAuth(config)}`,
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: params,
      signal: controller.signal,
    });

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      log.error(
        { action: "fitbit_token_request_failed", status: response.status, grantType: params.get("grant_type") },
        "fitbit token endpoint http failure",
      );
      throw new FitbitError(
        `Fitbit token request failed (${response.status}): ${body.slice(0, 500)}`,
        failureCode,
      );
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new FitbitError(`Invalid Fitbit token response: ${errorMessage(error)}`, failureCode, {
        cause: error,
      });
    }
    try {
      return parseTokenResponse(data);
    } catch (error) {
      throw new FitbitError(errorMessage(error), failureCode, { cause: error });
    }
  } finally {
    clearTimeout(timeoutId);
  }
}

export function buildAuthorizationUrl(config: OAuth2Config, state: string): string {
  const params = new URLSearchParams({
    client_id: config.clientId,
    response_type: "code",
    scope: (config.scopes ?? DEFAULT_SCOPES).join(" "),
    state,
  });
  if (config.redirectUri) {
    params.set("redirect_uri", config.redirectUri);
  }

  return `${config.authUrl ?? DEFAULT_AUTH_URL}?${params.toString()}`;
}

export async function exchangeAuthorizationCode(
  config: OAuth2Config,
  code: string,
  options: TokenEndpointOptions = {},
): Promise<OAuth2Token> {
  const params = new URLSearchParams({
    code,
    grant_type: "authorization_code",
  });
  if (config.redirectUri) {
    params.set("redirect_uri", config.redirectUri);
  }
  return postTokenRequest(
    config,
    params,
    "TOKEN_EXCHANGE_FAILED",
    options.fetch ?? globalThis.fetch,
    fitbitLogger(options.logger),
  );
}

export async function refreshAccessToken(
  config: OAuth2Config,
  refreshToken: string,
  options: TokenEndpointOptions = {},
): Promise<OAuth2Token> {
  const log = fitbitLogger(options.logger);
  log.debug({ action: "fitbit_token_refresh_start" }, "refreshing fitbit token");
  const params = new URLSearchParams({
    grant_type: "refresh_token",
    refresh_token: refreshToken,
  });
  return postTokenRequest(
    config,
    params,
    "TOKEN_REFRESH_FAILED",
    options.fetch ?? globalThis.fetch,
    log,
  );
}

export interface RefreshingTokenSupplierOptions extends TokenEndpointOptions {
  /**
   * Called with every newly issued token, e.g. to persist it. The new token is
   * already in use when the hook runs; a hook that throws is logged and does
   * not fail the request that triggered the refresh.
   */
  onTokenRefreshed?: (token: OAuth2Token) => void | Promise<void>;
  refreshBufferMs?: number;
}

/**
 * Holds one token and refreshes it through the token endpoint when it is
 * within the refresh buffer of expiry. Concurrent callers share one refresh.
 */
export class RefreshingTokenSupplier implements TokenSupplier {
  private token: OAuth2Token;
  private refreshInFlight: Promise<string> | null = null;
  private readonly log: Logger;

  constructor(
    private readonly config: OAuth2Config,
    token: OAuth2Token,
    private readonly options: RefreshingTokenSupplierOptions = {},
  ) {
    this.token = token;
    this.log = fitbitLogger(options.logger);
  }

  get currentToken(): OAuth2Token {
    return this.token;
  }

  async getAccessToken(): Promise<string> {
    if (!this.needsRefresh()) {
      return this.token.accessToken;
    }

    if (this.refreshInFlight) {
      return this.refreshInFlight;
    }

    const promise = this.refresh().finally(() => {
      this.refreshInFlight = null;
    });
    this.refreshInFlight = promise;
    return promise;
  }

  private needsRefresh(): boolean {
    const { expiresAt } = this.token;
    if (!expiresAt) return false;
    const buffer = this.options.refreshBufferMs ?? TOKEN_REFRESH_BUFFER_MS;
    return expiresAt.getTime() < Date.now() + buffer;
  }

  private async refresh(): Promise<string> {
    const { refreshToken } = this.token;
    if (!refreshToken) {
      throw new FitbitError(
        "Fitbit access token expired and no refresh token is available",
        "TOKEN_REFRESH_FAILED",
      );
    }

    const issued = await refreshAccessToken(this.config, refreshToken, this.options);
    // Fitbit rotates refresh tokens; keep the old one only if none came back
    this.token = { ...issued, refreshToken: issued.refreshToken ?? refreshToken };
    this.log.info(
      { action: "fitbit_token_refreshed", expiresAt: this.token.expiresAt?.toISOString() },
      "fitbit token refreshed",
    );

    if (this.options.onTokenRefreshed) {
      try {
        await this.options.onTokenRefreshed(this.token);
      } catch (error) {
        this.log.error(
          { action: "fitbit_token_refresh_hook_failed", error: errorMessage(error) },
          "onTokenRefreshed hook failed",
        );
      }
    }
    return this.token.accessToken;
  }
}
