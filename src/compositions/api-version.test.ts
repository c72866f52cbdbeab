import { describe, expect, it } from "vitest";

import { apiCategory, isTrackedApiVersion } from "./api-version.js";

describe("apiCategory", () => {
  it("returns the label before the provider domain", () => {
    expect(apiCategory("aws.upbound.io/v1beta1")).toBe("aws");
    expect(apiCategory("ec2.aws.upbound.io/v1beta1")).toBe("aws");
    expect(apiCategory("fn.crossplane.io/v1beta1")).toBe("fn");
    expect(apiCategory("kubernetes.crossplane.io/v1alpha2")).toBe("kubernetes");
  });

  it("falls back to other for untracked or empty versions", () => {
    expect(apiCategory("v1")).toBe("other");
    expect(apiCategory("")).toBe("other");
    expect(apiCategory("example.org/v1")).toBe("other");
  });
});

describe("isTrackedApiVersion", () => {
  it("matches crossplane and upbound groups only", () => {
    expect(isTrackedApiVersion("s3.aws.upbound.io/v1beta1")).toBe(true);
    expect(isTrackedApiVersion("pt.fn.crossplane.io/v1beta1")).toBe(true);
    expect(isTrackedApiVersion("example.org/v1")).toBe(false);
    expect(isTrackedApiVersion("crossplane.io/v1")).toBe(false);
  });
});
