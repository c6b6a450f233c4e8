import { OrganizerError } from "./errors.js";

/**
 * Canonical width for a suite number: 1-9 and 10-99 become two digits,
 * 100-999 three. Anything else comes back exactly as given.
 *
 *   "1" -> "01", "007" -> "07", "10" -> "10", "0100" -> "100", "0" -> "0"
 */
export function normalizeIdentifier(raw: string): string {
  if (!/^\d+$/.test(raw)) throw OrganizerError.invalidIdentifier(raw);

  const n = Number.parseInt(raw, 10);
  if (n >= 1 && n <= 99) return String(n).padStart(2, "0");
  if (n >= 100 && n <= 999) return String(n).padStart(3, "0");
  return raw;
}

export const JSON_EXTENSION = ".json";

export function stripJsonExtension(filename: string): string | null {
  if (!filename.endsWith(JSON_EXTENSION)) return null;
  return filename.slice(0, -JSON_EXTENSION.length);
}
