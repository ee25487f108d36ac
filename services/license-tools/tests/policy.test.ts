import { describe, expect, it } from "vitest";

import { evaluateLicense, splitLicenseIds } from "../src/policy.js";

describe("evaluateLicense", () => {
  it("approves licenses on the default list", () => {
    expect(evaluateLicense("MIT")).toBe("approved");
    expect(evaluateLicense("apache-2.0")).toBe("approved");
  });

  it("rejects licenses off the list", () => {
    expect(evaluateLicense("GPL-3.0")).toBe("not_approved");
  });

  it("requires every id of a compound license to be approved", () => {
    expect(evaluateLicense("(MIT OR Apache-2.0)")).toBe("approved");
    expect(evaluateLicense("MIT, GPL-2.0")).toBe("not_approved");
  });

  it("treats missing licenses as unknown", () => {
    expect(evaluateLicense(undefined)).toBe("unknown");
    expect(evaluateLicense("")).toBe("unknown");
    expect(evaluateLicense("Unknown")).toBe("unknown");
  });

  it("supports custom allow-lists", () => {
    expect(evaluateLicense("SSPL-1.0", ["SSPL-1.0"])).toBe("approved");
    expect(evaluateLicense("MIT", ["SSPL-1.0"])).toBe("not_approved");
  });
});

describe("splitLicenseIds", () => {
  it("splits SPDX expressions and lists", () => {
    expect(splitLicenseIds("(MIT OR Apache-2.0) AND BSD-3-Clause")).toEqual(["MIT", "Apache-2.0", "BSD-3-Clause"]);
    expect(splitLicenseIds("MIT/ISC")).toEqual(["MIT", "ISC"]);
  });
});
