const EXCLUDED_EXTRAS = new Set([
  "development",
  "dev",
  "test",
  "testing",
  "doc",
  "docs",
  "documentation",
  "lint",
  "linting",
  "typing",
  "check"
]);

const EXTRA_MARKER = /extra\s*==\s*["']([^"']+)["']/;
const PLATFORM_MARKER = /sys_platform\s*==\s*["']([^"']+)["']/;

/**
 * True when a requirement marker keeps the edge out of the runtime graph:
 * development-only extras, or a `sys_platform` pinned to another platform.
 */
export function isExcludedByMarker(marker: string | undefined, platform: string = process.platform): boolean {
  if (!marker) {
    return false;
  }

  const extra = EXTRA_MARKER.exec(marker)?.[1];
  if (extra && EXCLUDED_EXTRAS.has(extra.toLowerCase())) {
    return true;
  }

  const requiredPlatform = PLATFORM_MARKER.exec(marker)?.[1];
  return requiredPlatform !== undefined && requiredPlatform !== platform;
}
