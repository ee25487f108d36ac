import { z } from "zod";

import { APPROVED_LICENSES } from "./policy.js";

export const appConfigSchema = z.object({
  port: z.number().int().nonnegative(),
  credentials: z.object({
    librariesIoApiKey: z.string().optional(),
    githubToken: z.string().optional(),
    googleApiKey: z.string().optional(),
  }),
  endpoints: z.object({
    librariesIoBaseUrl: z.string().url(),
    spdxTextBaseUrl: z.string().url(),
    githubApiUrl: z.string().url(),
    geminiBaseUrl: z.string().url(),
  }),
  geminiModel: z.string().min(1),
  requestTimeoutMs: z.number().int().positive(),
  auditTimeoutMs: z.number().int().positive(),
  auditMaxChars: z.number().int().positive(),
  approvedLicenses: z.array(z.string().min(1)).min(1),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

type Env = Record<string, string | undefined>;

const optional = (value: string | undefined): string | undefined =>
  value && value.trim() ? value.trim() : undefined;

const numeric = (value: string | undefined, fallback: number): number =>
  value === undefined || value.trim() === "" ? fallback : Number(value);

const list = (value: string | undefined, fallback: readonly string[]): string[] => {
  const entries = (value ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
  return entries.length > 0 ? entries : [...fallback];
};

export function loadConfig(env: Env = process.env): AppConfig {
  return appConfigSchema.parse({
    port: numeric(env.PORT, 8080),
    credentials: {
      librariesIoApiKey: optional(env.LIBRARIES_IO_API_KEY),
      githubToken: optional(env.GITHUB_TOKEN),
      googleApiKey: optional(env.GOOGLE_API_KEY),
    },
    endpoints: {
      librariesIoBaseUrl: env.LIBRARIES_IO_BASE_URL ?? "https://libraries.io/api",
      spdxTextBaseUrl:
        env.SPDX_TEXT_BASE_URL ?? "https://raw.githubusercontent.com/spdx/license-list-data/main/text",
      githubApiUrl: env.GITHUB_API_URL ?? "https://api.github.com",
      geminiBaseUrl: env.GEMINI_BASE_URL ?? "https://generativelanguage.googleapis.com/v1beta",
    },
    geminiModel: env.GEMINI_MODEL ?? "gemini-2.0-flash",
    requestTimeoutMs: numeric(env.REQUEST_TIMEOUT_MS, 10000),
    auditTimeoutMs: numeric(env.AUDIT_TIMEOUT_MS, 60000),
    auditMaxChars: numeric(env.AUDIT_MAX_CHARS, 20000),
    approvedLicenses: list(env.APPROVED_LICENSES, APPROVED_LICENSES),
  });
}

export function trimBaseUrl(url: string): string {
  return url.replace(/\/$/, "");
}
