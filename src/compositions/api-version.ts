const TRACKED_DOMAIN_MARKERS = [".crossplane.io/", ".upbound.io/"];

const CATEGORY_PATTERNS = [/([^.]+)\.crossplane\.io/, /([^.]+)\.upbound\.io/];

export const OTHER_CATEGORY = "other";

export function isTrackedApiVersion(apiVersion: string): boolean {
  return TRACKED_DOMAIN_MARKERS.some((marker) => apiVersion.includes(marker));
}

/**
 * API group label immediately before the provider domain, e.g. `aws` for
 * `ec2.aws.upbound.io/v1beta1`. Crossplane domains are checked before Upbound ones.
 */
export function apiCategory(apiVersion: string): string {
  if (!apiVersion) {
    return OTHER_CATEGORY;
  }

  for (const pattern of CATEGORY_PATTERNS) {
    const match = pattern.exec(apiVersion);
    if (match?.[1]) {
      return match[1];
    }
  }

  return OTHER_CATEGORY;
}
