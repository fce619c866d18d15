import { Injectable } from "@nestjs/common";
import { z } from "zod";

const DEFAULT_PORT = 4000;
const DEFAULT_HOST = "0.0.0.0";
const DEFAULT_MONGODB_URI = "mongodb://localhost:27017/runfund";
const DEFAULT_LEADERBOARD_SIZE = 10;
const DEFAULT_HSTS_MAX_AGE = 31_536_000;

const referrerPolicySchema = z.enum([
  "no-referrer",
  "no-referrer-when-downgrade",
  "same-origin",
  "origin",
  "strict-origin",
  "origin-when-cross-origin",
  "strict-origin-when-cross-origin",
  "unsafe-url"
]);

export type ReferrerPolicy = z.infer<typeof referrerPolicySchema>;

export interface ApiConfig {
  port: number;
  host: string;
  mongodbUri: string;
  /** Normalized to `scheme://host[:port]`; browsers sending any other origin are refused. */
  allowedOrigins: string[];
  /** `0` turns the Strict-Transport-Security header off, e.g. for plain-http local runs. */
  hstsMaxAgeSeconds: number;
  referrerPolicy: ReferrerPolicy;
  leaderboardSize: number;
}

type Env = Record<string, string | undefined>;

export const parseIntEnv = (value: string | undefined, fallback: number, min = 0): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    return fallback;
  }

  return Math.max(min, parsed);
};

const readString = (value: string | undefined, fallback: string): string => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
};

export const normalizeOrigin = (raw: string): string => {
  const trimmed = raw.trim();

  try {
    return new URL(trimmed).origin;
  } catch {
    return trimmed;
  }
};

export const parseOriginList = (value: string | undefined): string[] => {
  const origins = (value ?? "")
    .split(",")
    .map(normalizeOrigin)
    .filter((origin) => origin.length > 0);

  return [...new Set(origins)];
};

export const loadApiConfig = (env: Env = process.env): ApiConfig => ({
  port: parseIntEnv(env.PORT, DEFAULT_PORT, 1),
  host: readString(env.HOST, DEFAULT_HOST),
  mongodbUri: readString(env.MONGODB_URI, DEFAULT_MONGODB_URI),
  allowedOrigins: parseOriginList(env.ALLOWED_ORIGINS),
  hstsMaxAgeSeconds: parseIntEnv(env.HSTS_MAX_AGE, DEFAULT_HSTS_MAX_AGE),
  referrerPolicy: referrerPolicySchema.catch("strict-origin-when-cross-origin").parse(env.REFERRER_POLICY?.trim()),
  leaderboardSize: parseIntEnv(env.LEADERBOARD_SIZE, DEFAULT_LEADERBOARD_SIZE, 1)
});

@Injectable()
export class ApiConfigService {
  private readonly config: ApiConfig;

  constructor() {
    this.config = loadApiConfig();
  }

  getMongodbUri(): string {
    return this.config.mongodbUri;
  }

  getLeaderboardSize(): number {
    return this.config.leaderboardSize;
  }
}
