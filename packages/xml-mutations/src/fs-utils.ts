/**
 * Check if an error is a "file not found" (ENOENT) error.
 */
export function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/**
 * Create an ISO timestamp safe for use in filenames.
 * Replaces colons and dots with dashes.
 */
export function createTimestamp(date: Date = new Date()): string {
  return date.toISOString().replaceAll(":", "-").replaceAll(".", "-");
}
