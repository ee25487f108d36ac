import { Inject, Injectable, Logger } from "@nestjs/common";

import { trimBaseUrl, type AppConfig } from "../config.js";
import { APP_CONFIG, FETCH_IMPL } from "../tokens.js";
import { found, notFound, transportError, type LookupResult } from "../types.js";
import { fetchWithTimeout, readText, type FetchFn } from "./http.js";

@Injectable()
export class SpdxTextClient {
  private readonly logger = new Logger(SpdxTextClient.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(FETCH_IMPL) private readonly fetchFn: FetchFn,
  ) {}

  async fetchText(licenseName: string): Promise<LookupResult<string>> {
    const url = `${trimBaseUrl(this.config.endpoints.spdxTextBaseUrl)}/${licenseName}.txt`;
    const response = await fetchWithTimeout(
      this.fetchFn,
      { service: "SPDX", url, timeoutMs: this.config.requestTimeoutMs },
      readText,
    );

    if (response.ok && response.status === 200) {
      return found(response.body);
    }

    this.logger.warn(`Could not fetch SPDX text for ${licenseName}`);
    if (response.status === 404) {
      return notFound(`No SPDX license text for ${licenseName}`);
    }
    return transportError(`SPDX request failed with status ${response.status}`, response.status);
  }
}
