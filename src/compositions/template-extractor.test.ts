import { describe, expect, it } from "vitest";

import { extractTemplateFragments } from "./template-extractor.js";
import { parseTemplatedFragment } from "./templated-fragment.js";

describe("parseTemplatedFragment", () => {
  it("reads apiVersion and kind from joined template lines", () => {
    const result = parseTemplatedFragment(
      "apiVersion: s3.aws.upbound.io/v1beta1 kind: Bucket metadata: name: {{ .observed.composite.name }}",
    );

    expect(result).toEqual({ apiVersion: "s3.aws.upbound.io/v1beta1", kind: "Bucket" });
  });

  it("stops values at template action delimiters", () => {
    const result = parseTemplatedFragment("apiVersion: iam.aws.upbound.io/v1beta1 kind: Role{{ if .x }}");

    expect(result).toEqual({ apiVersion: "iam.aws.upbound.io/v1beta1", kind: "Role" });
  });

  it("strips surrounding quotes", () => {
    const result = parseTemplatedFragment(`apiVersion: "rds.aws.upbound.io/v1beta1" kind: 'Instance'`);

    expect(result).toEqual({ apiVersion: "rds.aws.upbound.io/v1beta1", kind: "Instance" });
  });

  it("returns null when a value is only a template action", () => {
    expect(parseTemplatedFragment("apiVersion: {{ $api }} kind: Bucket")).toBeNull();
    expect(parseTemplatedFragment("kind: Bucket")).toBeNull();
  });
});

describe("extractTemplateFragments", () => {
  it("splits fragments on document separators", () => {
    const template = [
      "apiVersion: s3.aws.upbound.io/v1beta1",
      "kind: Bucket",
      "metadata:",
      "  name: {{ .observed.composite.resource.metadata.name }}",
      "---",
      "apiVersion: iam.aws.upbound.io/v1beta1",
      "kind: Role",
    ].join("\n");

    expect(extractTemplateFragments(template)).toEqual([
      { apiVersion: "s3.aws.upbound.io/v1beta1", kind: "Bucket" },
      { apiVersion: "iam.aws.upbound.io/v1beta1", kind: "Role" },
    ]);
  });

  it("never starts a fragment on a comment line", () => {
    const template = [
      "# apiVersion: fake/v1",
      "# kind: Fake",
      "apiVersion: ec2.aws.upbound.io/v1beta1",
      "kind: VPC",
    ].join("\n");

    expect(extractTemplateFragments(template)).toEqual([
      { apiVersion: "ec2.aws.upbound.io/v1beta1", kind: "VPC" },
    ]);
  });

  it("starts a new fragment on each confirmed apiVersion line without separators", () => {
    const template = [
      "{{- range $i := until 2 }}",
      "apiVersion: ec2.aws.upbound.io/v1beta1",
      "kind: Subnet",
      "metadata:",
      "  name: subnet-{{ $i }}",
      "{{- end }}",
      "apiVersion: ec2.aws.upbound.io/v1beta1",
      "kind: RouteTable",
    ].join("\n");

    expect(extractTemplateFragments(template)).toEqual([
      { apiVersion: "ec2.aws.upbound.io/v1beta1", kind: "Subnet" },
      { apiVersion: "ec2.aws.upbound.io/v1beta1", kind: "RouteTable" },
    ]);
  });

  it("accepts metadata as the confirm marker", () => {
    const template = ["apiVersion: v1", "metadata:", "  name: settings", "kind: ConfigMap"].join("\n");

    expect(extractTemplateFragments(template)).toEqual([{ apiVersion: "v1", kind: "ConfigMap" }]);
  });

  it("ignores apiVersion lines without a nearby confirm marker", () => {
    const template = ["apiVersion: v1", "spec:", "  a: b", "  c: d", "kind: Orphan"].join("\n");

    expect(extractTemplateFragments(template)).toEqual([]);
  });
});
