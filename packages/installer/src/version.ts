const VERSION_PATTERN = /^\d+(\.\d+)+$/;

/**
 * Parse a dotted numeric version (e.g. "11.0.16.8512") into its components.
 * Throws if the string has fewer than two parts or non-numeric parts.
 */
export function parseVersion(version: string): number[] {
  if (!VERSION_PATTERN.test(version)) {
    throw new Error(`Invalid version string: "${version}"`);
  }
  return version.split(".").map(Number);
}

export function isValidVersion(version: string): boolean {
  return VERSION_PATTERN.test(version);
}

/**
 * Compare two dotted versions component by component; missing trailing
 * components count as 0. Returns -1 if a < b, 0 if a === b, 1 if a > b.
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  const left = parseVersion(a);
  const right = parseVersion(b);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const x = left[i] ?? 0;
    const y = right[i] ?? 0;
    if (x !== y) return x > y ? 1 : -1;
  }
  return 0;
}

/**
 * Returns true if the latest version is newer than the current version.
 */
export function isNewerVersion(current: string, latest: string): boolean {
  return compareVersions(latest, current) === 1;
}
