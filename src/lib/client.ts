/**
 * Authenticated HTTP client for the Fitbit Web API (read-only resources).
 * One fetch per call: no retries, no caching.
 */

import type {
  ActivitySummary,
  HttpMethod,
  OAuth2Config,
  OAuth2Token,
  UserProfile,
} from "../types/index.js";
import { formatDay, getTodayDate } from "./date-utils.js";
import { apiBaseUrlFromEnv, DEFAULT_API_BASE_URL, oauthConfigFromEnv } from "./env.js";
import {
  DecodeError,
  errorMessage,
  MalformedInputError,
  RequestFailedError,
  TransportError,
} from "./errors.js";
import { fitbitLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { RefreshingTokenSupplier } from "./oauth.js";
import type { RefreshingTokenSupplierOptions, TokenSupplier } from "./oauth.js";

export const USER_AGENT = "fitbit-lite:v0.1.0";

export interface FitbitClientOptions {
  tokenSupplier: TokenSupplier;
  baseUrl?: string;
  userAgent?: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

/**
 * Resolve `path` beneath `base`. The base is treated as a directory and
 * leading slashes on the path are dropped, so the base's own path survives.
 * Throws when the result leaves the base (another origin, a scheme, `..`).
 */
export function joinUrl(base: string, path: string): URL {
  const directory = new URL(base.endsWith("/") ? base : `${base}/`);
  const url = new URL(path.replace(/^\/+/, ""), directory);
  if (url.origin !== directory.origin || !url.pathname.startsWith(directory.pathname)) {
    throw new Error(`Path ${path} resolves outside ${directory.href}`);
  }
  return url;
}

function encodeBody(body: unknown): string {
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(body);
  } catch (error) {
    throw new MalformedInputError(
      `Could not encode request body as JSON: ${errorMessage(error)}`,
      { cause: error },
    );
  }
  if (encoded === undefined) {
    throw new MalformedInputError("Request body has no JSON representation");
  }
  return encoded;
}

export class FitbitClient {
  readonly baseUrl: string;
  readonly userAgent: string;
  private readonly tokenSupplier: TokenSupplier;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;

  constructor(options: FitbitClientOptions) {
    this.tokenSupplier = options.tokenSupplier;
    this.baseUrl = options.baseUrl ?? DEFAULT_API_BASE_URL;
    this.userAgent = options.userAgent ?? USER_AGENT;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.log = fitbitLogger(options.logger);
  }

  /**
   * Build a request for `path` relative to the base URL. A `body` other than
   * null or undefined is sent as JSON.
   */
  newRequest(method: HttpMethod, path: string, body?: unknown): Request {
    let url: URL;
    try {
      url = joinUrl(this.baseUrl, path);
    } catch (error) {
      throw new MalformedInputError(
        `Invalid request address: ${this.baseUrl} + ${path}`,
        { cause: error },
      );
    }

    const headers = new Headers({
      "User-Agent": this.userAgent,
      Accept: "application/json",
    });
    let encoded: string | undefined;
    if (body !== undefined && body !== null) {
      encoded = encodeBody(body);
      headers.set("Content-Type", "application/json");
    }

    try {
      return new Request(url, { method, headers, body: encoded });
    } catch (error) {
      throw new MalformedInputError(
        `Could not build ${method} request: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * Send `request` and check the status. The body is discarded.
   */
  async execute(request: Request): Promise<Response> {
    const response = await this.send(request);
    await this.ensureSuccess(request, response);
    await response.body?.cancel();
    return response;
  }

  /**
   * Send `request`, check the status, and decode the JSON body.
   */
  async executeJson<T>(request: Request): Promise<T> {
    const response = await this.send(request);
    await this.ensureSuccess(request, response);

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      this.log.error(
        { action: "fitbit_read_body_failed", path: new URL(request.url).pathname, error: errorMessage(error) },
        "reading response body failed",
      );
      throw new TransportError(`Reading Fitbit response failed: ${errorMessage(error)}`, { cause: error });
    }

    try {
      const data: T = JSON.parse(text);
      this.log.debug(
        { action: "fitbit_request_success", path: new URL(request.url).pathname, status: response.status },
        "fitbit request succeeded",
      );
      return data;
    } catch (error) {
      this.log.error(
        { action: "fitbit_decode_failed", path: new URL(request.url).pathname, error: errorMessage(error) },
        "response body is not valid JSON",
      );
      throw new DecodeError(`Invalid JSON in Fitbit response: ${errorMessage(error)}`, { cause: error });
    }
  }

  /** `day` is a yyyy-MM-dd string (passed through as is) or a Date; defaults to today, local time. */
  async activitySummaryForDay(day: string | Date = getTodayDate()): Promise<ActivitySummary> {
    const date = typeof day === "string" ? day : formatDay(day);
    const request = this.newRequest("GET", `/user/-/activities/date/${date}.json`);
    return this.executeJson<ActivitySummary>(request);
  }

  async userProfile(): Promise<UserProfile> {
    const request = this.newRequest("GET", "/user/-/profile.json");
    return this.executeJson<UserProfile>(request);
  }

  private async send(request: Request): Promise<Response> {
    const path = new URL(request.url).pathname;

    let accessToken: string;
    try {
      accessToken = await this.tokenSupplier.getAccessToken();
    } catch (error) {
      this.log.error(
        { action: "fitbit_token_unavailable", path, error: errorMessage(error) },
        "could not obtain access token",
      );
      throw new TransportError(`Could not obtain Fitbit access token: ${errorMessage(error)}`, { cause: error });
    }

    const headers = new Headers(request.headers);
    headers.set("Authorization", `Bearer ${accessToken}`);
    const authorized = new Request(request, { headers });

    this.log.debug({ action: "fitbit_request", method: request.method, path }, "sending fitbit request");
    try {
      return await this.fetchImpl(authorized);
    } catch (error) {
      this.log.error(
        { action: "fitbit_transport_failed", method: request.method, path, error: errorMessage(error) },
        "fitbit request could not be sent",
      );
      throw new TransportError(`Fitbit request failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async ensureSuccess(request: Request, response: Response): Promise<void> {
    if (response.status >= 200 && response.status <= 299) {
      return;
    }
    const body = await response.text().catch(() => "");
    this.log.warn(
      { action: "fitbit_request_failed", method: request.method, path: new URL(request.url).pathname, status: response.status },
      "fitbit request returned non-success status",
    );
    throw new RequestFailedError(response, body);
  }
}

export type NewClientOptions = Omit<FitbitClientOptions, "tokenSupplier"> &
  Pick<RefreshingTokenSupplierOptions, "onTokenRefreshed" | "refreshBufferMs">;

/**
 * Binds OAuth2 application credentials; hands out clients for individual tokens.
 */
export class ConfigSource {
  constructor(
    readonly config: OAuth2Config,
    private readonly defaults: Omit<NewClientOptions, "onTokenRefreshed"> = {},
  ) {}

  /** Credentials from FITBIT_CLIENT_ID / FITBIT_CLIENT_SECRET, base URL from FITBIT_API_BASE_URL. */
  static fromEnv(): ConfigSource {
    return new ConfigSource(oauthConfigFromEnv(), { baseUrl: apiBaseUrlFromEnv() });
  }

  newClient(token: OAuth2Token, options: NewClientOptions = {}): FitbitClient {
    const { onTokenRefreshed, refreshBufferMs, ...clientOptions } = { ...this.defaults, ...options };
    const tokenSupplier = new RefreshingTokenSupplier(this.config, token, {
      fetch: clientOptions.fetch,
      logger: clientOptions.logger,
      onTokenRefreshed,
      refreshBufferMs,
    });
    return new FitbitClient({ ...clientOptions, tokenSupplier });
  }
}
