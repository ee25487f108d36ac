import { Inject, Injectable, Logger } from "@nestjs/common";

import type { AppConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { APP_CONFIG, FETCH_IMPL } from "../tokens.js";
import { found, notFound, transportError, type LookupResult } from "../types.js";
import { fetchWithTimeout, readText, type FetchFn } from "./http.js";

@Injectable()
export class LicenseFileClient {
  private readonly logger = new Logger(LicenseFileClient.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(FETCH_IMPL) private readonly fetchFn: FetchFn,
  ) {}

  /** Downloads a license file. Never throws. */
  async fetchFromUrl(url: string | null | undefined): Promise<LookupResult<string>> {
    if (!url) {
      return notFound("No URL provided");
    }
    try {
      const response = await fetchWithTimeout(
        this.fetchFn,
        { service: "License file", url, timeoutMs: this.config.requestTimeoutMs },
        readText,
      );
      if (response.ok && response.status === 200) {
        return found(response.body);
      }
      return transportError(`License file request failed with status ${response.status}`, response.status);
    } catch (error) {
      this.logger.error(`Failed to fetch license from ${url}: ${errorMessage(error)}`);
      return transportError(errorMessage(error));
    }
  }
}
