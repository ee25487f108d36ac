import { Inject, Injectable } from "@nestjs/common";
import { z } from "zod";

import { trimBaseUrl, type AppConfig } from "../config.js";
import { UpstreamRequestError } from "../errors.js";
import { APP_CONFIG, FETCH_IMPL } from "../tokens.js";
import { fetchWithTimeout, readJson, type FetchFn } from "./http.js";

const generateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
      }),
    )
    .default([]),
});

@Injectable()
export class GeminiClient {
  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(FETCH_IMPL) private readonly fetchFn: FetchFn,
  ) {}

  /** Single-turn generateContent call returning the first candidate's text. */
  async generateText(apiKey: string, prompt: string): Promise<string> {
    const base = trimBaseUrl(this.config.endpoints.geminiBaseUrl);
    const model = encodeURIComponent(this.config.geminiModel);
    const response = await fetchWithTimeout(
      this.fetchFn,
      {
        service: "Gemini",
        url: `${base}/models/${model}:generateContent`,
        init: {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            "x-goog-api-key": apiKey,
          },
          body: JSON.stringify({ contents: [{ role: "user", parts: [{ text: prompt }] }] }),
        },
        timeoutMs: this.config.auditTimeoutMs,
      },
      readJson,
    );

    if (!response.ok) {
      throw new UpstreamRequestError("Gemini", `Gemini request failed with status ${response.status}`, response.status);
    }

    const { candidates } = generateResponseSchema.parse(response.body);
    const parts = candidates[0]?.content?.parts ?? [];
    const text = parts.map((part) => part.text ?? "").join("");
    if (!text.trim()) {
      throw new UpstreamRequestError("Gemini", "Gemini response contained no text");
    }
    return text;
  }
}
