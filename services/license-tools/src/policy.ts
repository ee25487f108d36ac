import type { PolicyStatus } from "./types.js";

export const APPROVED_LICENSES: readonly string[] = [
  "MIT",
  "ISC",
  "BSD-2-Clause",
  "BSD-3-Clause",
  "Apache-2.0",
  "MPL-2.0",
];

const SEPARATOR = /\s*(?:,|\/|\(|\)|\bOR\b|\bAND\b)\s*/;

export function splitLicenseIds(license: string): string[] {
  return license
    .split(SEPARATOR)
    .map((id) => id.trim())
    .filter(Boolean);
}

export function evaluateLicense(
  license: string | undefined,
  approved: readonly string[] = APPROVED_LICENSES,
): PolicyStatus {
  const ids = license ? splitLicenseIds(license) : [];
  if (ids.length === 0 || (ids.length === 1 && ids[0].toLowerCase() === "unknown")) {
    return "unknown";
  }
  const allowed = new Set(approved.map((id) => id.toLowerCase()));
  return ids.every((id) => allowed.has(id.toLowerCase())) ? "approved" : "not_approved";
}
