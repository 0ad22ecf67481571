import type { OAuth2Config } from "../types/index.js";

export const DEFAULT_API_BASE_URL = "https://api.fitbit.com/1";

export function getRequiredEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Required environment variable ${name} is not set`);
  }
  return value;
}

export function getOptionalEnv(name: string): string | undefined {
  const value = process.env[name];
  return value ? value : undefined;
}

export function oauthConfigFromEnv(): OAuth2Config {
  const redirectUri = getOptionalEnv("FITBIT_REDIRECT_URI");
  return {
    clientId: getRequiredEnv("FITBIT_CLIENT_ID"),
    clientSecret: getRequiredEnv("FITBIT_CLIENT_SECRET"),
    ...(redirectUri !== undefined && { redirectUri }),
  };
}

export function apiBaseUrlFromEnv(): string {
  return getOptionalEnv("FITBIT_API_BASE_URL") ?? DEFAULT_API_BASE_URL;
}
