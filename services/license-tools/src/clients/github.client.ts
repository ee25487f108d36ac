import { Inject, Injectable, Logger } from "@nestjs/common";
import { z } from "zod";

import { trimBaseUrl, type AppConfig } from "../config.js";
import { UpstreamRequestError, errorMessage } from "../errors.js";
import { APP_CONFIG, FETCH_IMPL } from "../tokens.js";
import {
  found,
  notConfigured,
  notFound,
  transportError,
  type LookupResult,
  type RepositoryLicense,
} from "../types.js";
import { fetchWithTimeout, readJson, type FetchFn, type UpstreamResponse } from "./http.js";

const searchSchema = z.object({
  items: z.array(z.object({ full_name: z.string().min(1) })).default([]),
});

const licenseSchema = z.object({
  license: z.object({ spdx_id: z.string().min(1) }),
});

const contentsSchema = z.array(z.object({ name: z.string() }));

const LICENSE_FILE_PATTERN = /license|copying/i;

@Injectable()
export class GitHubLicenseClient {
  private readonly logger = new Logger(GitHubLicenseClient.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(FETCH_IMPL) private readonly fetchFn: FetchFn,
  ) {}

  /**
   * Searches repositories by keyword, then asks the top hit's license
   * endpoint, then scans its top-level files. Each step runs only when the
   * previous one came up empty.
   */
  async search(packageName: string): Promise<LookupResult<RepositoryLicense>> {
    const token = this.config.credentials.githubToken;
    if (!token) {
      this.logger.warn("GITHUB_TOKEN is not set");
      return notConfigured("GitHub token not configured");
    }

    try {
      const search = await this.get(token, `/search/repositories?${new URLSearchParams({ q: packageName })}`);
      if (!search.ok) {
        throw new UpstreamRequestError("GitHub", `GitHub search failed with status ${search.status}`, search.status);
      }
      const { items } = searchSchema.parse(search.body);
      if (items.length === 0) {
        return notFound(`No repositories found for ${packageName}`);
      }

      const repository = items[0].full_name;
      const spdxId = await this.licenseFromApi(token, repository);
      if (spdxId) {
        return found({ source: "license_api", repository, spdxId });
      }

      const files = await this.licenseFilesFromContents(token, repository);
      if (files.length > 0) {
        return found({ source: "contents", repository, files });
      }
      return notFound(`No license information found for ${repository}`);
    } catch (error) {
      this.logger.error(`GitHub API request failed: ${errorMessage(error)}`);
      return transportError(
        errorMessage(error),
        error instanceof UpstreamRequestError ? error.status : undefined,
      );
    }
  }

  private async licenseFromApi(token: string, repository: string): Promise<string | undefined> {
    const response = await this.get(token, `/repos/${repository}/license`);
    if (!response.ok || response.status !== 200) {
      return undefined;
    }
    const parsed = licenseSchema.safeParse(response.body);
    return parsed.success ? parsed.data.license.spdx_id : undefined;
  }

  private async licenseFilesFromContents(token: string, repository: string): Promise<string[]> {
    const response = await this.get(token, `/repos/${repository}/contents`);
    if (!response.ok || response.status !== 200) {
      return [];
    }
    const parsed = contentsSchema.safeParse(response.body);
    if (!parsed.success) {
      return [];
    }
    return parsed.data.map((entry) => entry.name).filter((name) => LICENSE_FILE_PATTERN.test(name));
  }

  private get(token: string, path: string): Promise<UpstreamResponse<unknown>> {
    return fetchWithTimeout(
      this.fetchFn,
      {
        service: "GitHub",
        url: `${trimBaseUrl(this.config.endpoints.githubApiUrl)}${path}`,
        init: {
          headers: {
            Authorization: `token ${token}`,
            Accept: "application/vnd.github.v3+json",
          },
        },
        timeoutMs: this.config.requestTimeoutMs,
      },
      readJson,
    );
  }
}
