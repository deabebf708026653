/**
 * config.ts: Runtime configuration read from Vite env variables.
 *
 * Vite replaces import.meta.env.VITE_* at build time; values come from the
 * .env file at the repo root (see .env.example).
 */

import { z } from "zod";

// A missing or malformed value falls back to its default; config never stops the app from mounting.
const envSchema = z.object({
  VITE_API_BASE_URL: z.string().trim().min(1).catch("http://localhost:8000"),
  VITE_DEFAULT_IMAGE_URL: z.string().trim().catch(""),
  VITE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).catch("info"),
});

export type LogLevel = z.infer<typeof envSchema>["VITE_LOG_LEVEL"];

export interface AppConfig {
  apiBaseUrl: string;
  defaultImageUrl: string;
  logLevel: LogLevel;
}

export function loadConfig(env: Record<string, unknown>): AppConfig {
  const parsed = envSchema.parse({
    VITE_API_BASE_URL: env.VITE_API_BASE_URL || undefined,
    VITE_DEFAULT_IMAGE_URL: env.VITE_DEFAULT_IMAGE_URL || undefined,
    VITE_LOG_LEVEL: env.VITE_LOG_LEVEL || undefined,
  });
  return {
    apiBaseUrl: parsed.VITE_API_BASE_URL.replace(/\/+$/, ""),
    defaultImageUrl: parsed.VITE_DEFAULT_IMAGE_URL,
    logLevel: parsed.VITE_LOG_LEVEL,
  };
}

export const config: AppConfig = loadConfig(import.meta.env);
