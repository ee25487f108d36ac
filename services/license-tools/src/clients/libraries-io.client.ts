import { Inject, Injectable, Logger } from "@nestjs/common";
import { z } from "zod";

import { trimBaseUrl, type AppConfig } from "../config.js";
import { APP_CONFIG, FETCH_IMPL } from "../tokens.js";
import {
  found,
  notConfigured,
  notFound,
  transportError,
  type LookupResult,
  type PackageCoordinate,
} from "../types.js";
import { fetchWithTimeout, readJson, type FetchFn } from "./http.js";

const licenseField = z.union([z.string(), z.array(z.string())]).nullish().catch(undefined);

const projectSchema = z.object({
  normalized_licenses: licenseField,
  licenses: licenseField,
});

function pickLicense(value: z.infer<typeof licenseField>): string | undefined {
  if (typeof value === "string") {
    return value.trim() || undefined;
  }
  const ids = (value ?? []).map((entry) => entry.trim()).filter(Boolean);
  return ids.length > 0 ? ids.join(", ") : undefined;
}

@Injectable()
export class LibrariesIoClient {
  private readonly logger = new Logger(LibrariesIoClient.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(FETCH_IMPL) private readonly fetchFn: FetchFn,
  ) {}

  /**
   * Declared license of a package version. Timeouts and connection failures
   * are not caught and reach the caller as UpstreamRequestError.
   */
  async lookup(coordinate: PackageCoordinate): Promise<LookupResult<string>> {
    const apiKey = this.config.credentials.librariesIoApiKey;
    if (!apiKey) {
      this.logger.warn("LIBRARIES_IO_API_KEY is not set");
      return notConfigured("Libraries.io API key not configured");
    }

    const base = trimBaseUrl(this.config.endpoints.librariesIoBaseUrl);
    const name = `${encodeURIComponent(coordinate.group)}:${encodeURIComponent(coordinate.artifact)}`;
    const url = `${base}/${coordinate.ecosystem}/${name}/${encodeURIComponent(coordinate.version)}?${new URLSearchParams({ api_key: apiKey })}`;

    const coordinateLabel = `${coordinate.group}:${coordinate.artifact}@${coordinate.version}`;
    const response = await fetchWithTimeout(
      this.fetchFn,
      { service: "Libraries.io", url, timeoutMs: this.config.requestTimeoutMs },
      readJson,
    );

    if (!response.ok || response.status !== 200) {
      this.logger.error(`Libraries.io request failed: ${response.status}`);
      if (response.status === 404) {
        return notFound(`Libraries.io has no record of ${coordinateLabel}`);
      }
      return transportError(`Libraries.io request failed with status ${response.status}`, response.status);
    }

    const parsed = projectSchema.safeParse(response.body);
    const license = parsed.success
      ? pickLicense(parsed.data.normalized_licenses) ?? pickLicense(parsed.data.licenses)
      : undefined;

    if (!license) {
      return notFound(`No license declared for ${coordinateLabel}`);
    }
    return found(license);
  }
}
