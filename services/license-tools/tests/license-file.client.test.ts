import { Logger } from "@nestjs/common";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";

import { globalFetch, type FetchFn } from "../src/clients/http.js";
import { LicenseFileClient } from "../src/clients/license-file.client.js";
import { renderTextMessage } from "../src/tools/messages.js";
import { buildConfig, startStalledServer, textResponse } from "./helpers.js";

const LICENSE_URL = "https://raw.githubusercontent.com/acme/widgets/main/LICENSE";

describe("LicenseFileClient", () => {
  let fetchMock: Mock<FetchFn>;
  let client: LicenseFileClient;

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
    client = new LicenseFileClient(buildConfig(), fetchMock);
    vi.spyOn(Logger.prototype, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it.each([[""], [null], [undefined]])("returns an empty string for %s without a request", async (url) => {
    const result = await client.fetchFromUrl(url);

    expect(result).toEqual({ kind: "not_found", message: "No URL provided" });
    expect(renderTextMessage(result)).toBe("");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("downloads the file body", async () => {
    fetchMock.mockResolvedValue(textResponse("Copyright (c) 2024 Acme\n"));

    const result = await client.fetchFromUrl(LICENSE_URL);

    expect(renderTextMessage(result)).toBe("Copyright (c) 2024 Acme\n");
    expect(fetchMock.mock.calls[0][0]).toBe(LICENSE_URL);
  });

  it("degrades silently on non-200 responses", async () => {
    const response = textResponse("missing", 404);
    fetchMock.mockResolvedValue(response);

    const result = await client.fetchFromUrl(LICENSE_URL);

    expect(result).toEqual({
      kind: "transport_error",
      message: "License file request failed with status 404",
      status: 404,
    });
    expect(renderTextMessage(result)).toBe("");
    expect(response.bodyUsed).toBe(true);
    expect(Logger.prototype.error).not.toHaveBeenCalled();
  });

  it("swallows connection errors and logs them", async () => {
    fetchMock.mockRejectedValue(new TypeError("connect ECONNREFUSED"));

    const result = await client.fetchFromUrl(LICENSE_URL);

    expect(result).toEqual({
      kind: "transport_error",
      message: "License file request failed: connect ECONNREFUSED",
    });
    expect(renderTextMessage(result)).toBe("");
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      `Failed to fetch license from ${LICENSE_URL}: License file request failed: connect ECONNREFUSED`,
    );
  });

  it("catches malformed urls", async () => {
    const result = await new LicenseFileClient(buildConfig(), globalFetch).fetchFromUrl("not a url");

    expect(result.kind).toBe("transport_error");
    expect(renderTextMessage(result)).toBe("");
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      expect.stringMatching(/^Failed to fetch license from not a url: License file request failed: /),
    );
  });

  it("times out a body that stops arriving", async () => {
    const server = await startStalledServer();
    const url = `${server.url}/LICENSE`;
    try {
      const slowClient = new LicenseFileClient(buildConfig({}, { requestTimeoutMs: 200 }), globalFetch);

      const result = await slowClient.fetchFromUrl(url);

      expect(result).toEqual({ kind: "transport_error", message: "License file request timed out" });
      expect(renderTextMessage(result)).toBe("");
      expect(Logger.prototype.error).toHaveBeenCalledWith(
        `Failed to fetch license from ${url}: License file request timed out`,
      );
    } finally {
      await server.close();
    }
  });
});
