import type { AuditVerdict, LookupResult, RepositoryLicense } from "../types.js";

export const UNKNOWN_LICENSE = "Unknown";

export function renderLicenseMessage(result: LookupResult<string>): string {
  return result.kind === "found" ? result.value : UNKNOWN_LICENSE;
}

export function renderTextMessage(result: LookupResult<string>): string {
  return result.kind === "found" ? result.value : "";
}

export function renderSearchMessage(result: LookupResult<RepositoryLicense>): string {
  switch (result.kind) {
    case "found":
      return result.value.source === "license_api"
        ? `Found license for ${result.value.repository}: ${result.value.spdxId}`
        : `Found potential license file(s) in ${result.value.repository}: ${result.value.files.join(", ")}`;
    case "not_configured":
      return `Could not search: ${result.message}`;
    case "not_found":
      return result.message;
    case "transport_error":
      return `Error searching for license: ${result.message}`;
  }
}

export function renderAuditMessage(result: LookupResult<AuditVerdict>): string {
  switch (result.kind) {
    case "found":
      return result.value.text;
    case "not_configured":
      return `Could not analyze: ${result.message}`;
    case "not_found":
      return result.message;
    case "transport_error":
      return `Error analyzing license: ${result.message}`;
  }
}
