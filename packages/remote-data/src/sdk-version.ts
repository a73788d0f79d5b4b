/**
 * Compare two dotted version strings numerically (`17.10.0` > `17.9.2`).
 *
 * Missing segments count as 0 and any non-numeric suffix of a segment is
 * ignored, so `17.1.0-beta` compares equal to `17.1`.
 */
export function compareSdkVersions(a: string, b: string): number {
  const left = parseSegments(a);
  const right = parseSegments(b);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * Whether an SDK at `sdkVersion` can display a message requiring `minSdkVersion`
 */
export function meetsMinSdkVersion(sdkVersion: string, minSdkVersion: string | undefined): boolean {
  if (!minSdkVersion) return true;
  return compareSdkVersions(sdkVersion, minSdkVersion) >= 0;
}

function parseSegments(version: string): number[] {
  return version
    .trim()
    .split('.')
    .map((segment) => {
      const match = /^\d+/.exec(segment);
      return match ? Number(match[0]) : 0;
    });
}
