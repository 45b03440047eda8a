/**
 * The one blank check every layer goes through: a value is present when
 * trimming spaces, tabs and line breaks leaves something behind.
 *
 * Returns the trimmed value, or `undefined` for missing and blank input.
 */
export function presentText(value: string | null | undefined): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function equalsIgnoringCase(left: string, right: string): boolean {
  return left.localeCompare(right, "en", { sensitivity: "accent" }) === 0;
}
