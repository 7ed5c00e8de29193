const TRUE_VALUES = new Set(["true", "1", "yes", "on", "t", "y"]);

/** Interprets configuration and header flags the way operators write them. */
export function configTrueValue(value: string | null | undefined): boolean {
  return value != null && TRUE_VALUES.has(value.trim().toLowerCase());
}

/** Swift's normalized timestamp form: `0001700000000.12345`. */
export function normalizeTimestamp(seconds: number): string {
  return seconds.toFixed(5).padStart(16, "0");
}
