// Shapes mirror the Fitbit Web API JSON. Nothing here is validated at runtime.

export interface Distance {
  activity: string;
  distance: number;
}

export interface Goals {
  activeMinutes: number;
  caloriesOut: number;
  distance: number;
  steps: number;
}

export interface Summary {
  activeScore: number;
  activityCalories: number;
  caloriesBMR: number;
  caloriesOut: number;
  distances: Distance[];
  fairlyActiveMinutes: number;
  lightlyActiveMinutes: number;
  marginalCalories: number;
  sedentaryMinutes: number;
  steps: number;
  veryActiveMinutes: number;
}

export interface ActivitySummary {
  goals: Goals;
  summary: Summary;
}

export interface User {
  strideLengthRunningType: string;
  weight: number;
  age: number;
  fullName: string;
  gender: string;
  glucoseUnit: string;
  country: string;
  strideLengthWalking: number;
  avatar: string;
  encodedId: string;
  startDayOfWeek: string;
  avatar150: string;
  corporate: boolean;
  dateOfBirth: string; // 1970-01-01
  heightUnit: string;
  locale: string;
  memberSince: string; // 2013-06-27
  offsetFromUTCMillis: number;
  averageDailySteps: number;
  timezone: string;
  strideLengthRunning: number;
  weightUnit: string;
  distanceUnit: string;
  height: number;
  strideLengthWalkingType: string;
  displayName: string;
}

export interface UserProfile {
  user: User;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

export interface OAuth2Config {
  clientId: string;
  clientSecret: string;
  redirectUri?: string;
  scopes?: readonly string[];
  authUrl?: string;
  tokenUrl?: string;
}

export interface OAuth2Token {
  accessToken: string;
  refreshToken?: string;
  tokenType?: string;
  /** Absent means the token is treated as never expiring. */
  expiresAt?: Date;
}

export type ErrorCode =
  | "MALFORMED_INPUT"
  | "TRANSPORT_ERROR"
  | "REQUEST_FAILED"
  | "DECODE_ERROR"
  | "TOKEN_REFRESH_FAILED"
  | "TOKEN_EXCHANGE_FAILED";
