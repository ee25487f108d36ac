import { Inject, Injectable, Logger } from "@nestjs/common";

import { GeminiClient } from "../clients/gemini.client.js";
import type { AppConfig } from "../config.js";
import { UpstreamRequestError, errorMessage } from "../errors.js";
import { APP_CONFIG } from "../tokens.js";
import {
  found,
  notConfigured,
  transportError,
  type AuditVerdict,
  type LookupResult,
} from "../types.js";
import { FLAGGED_MARKER, STANDARD_MARKER, buildAuditPrompt, truncateLicenseText } from "./prompt.js";

export function classifyVerdict(reply: string): AuditVerdict {
  const text = reply.trim();
  if (text === STANDARD_MARKER) {
    return { status: "standard", text };
  }
  if (text.startsWith(FLAGGED_MARKER)) {
    return { status: "flagged", text, explanation: text.slice(FLAGGED_MARKER.length).trim() };
  }
  return { status: "unrecognized", text };
}

@Injectable()
export class ClauseAuditorService {
  private readonly logger = new Logger(ClauseAuditorService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(GeminiClient) private readonly gemini: GeminiClient,
  ) {}

  async audit(licenseText: string): Promise<LookupResult<AuditVerdict>> {
    const apiKey = this.config.credentials.googleApiKey;
    if (!apiKey) {
      this.logger.warn("GOOGLE_API_KEY not set");
      return notConfigured("Google API key not configured");
    }

    const { text, omitted } = truncateLicenseText(licenseText, this.config.auditMaxChars);
    if (omitted > 0) {
      this.logger.warn(`License text truncated by ${omitted} characters before analysis`);
    }

    try {
      const reply = await this.gemini.generateText(apiKey, buildAuditPrompt(text));
      return found(classifyVerdict(reply));
    } catch (error) {
      this.logger.error(`License analysis failed: ${errorMessage(error)}`);
      return transportError(
        errorMessage(error),
        error instanceof UpstreamRequestError ? error.status : undefined,
      );
    }
  }
}
