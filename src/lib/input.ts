/**
 * Input normalization: trim, collapse whitespace, reject empty input
 */

export interface InputNormalizer {
  /** Returns null for non-string or empty-after-trim input */
  normalize(raw: unknown): string | null;
}

const EXIT_COMMANDS = new Set(["quit", "exit", "bye", "goodbye"]);

export function normalizeInput(raw: unknown): string | null {
  if (typeof raw !== "string") return null;
  const cleaned = raw.trim().replace(/\s+/g, " ");
  return cleaned.length > 0 ? cleaned : null;
}

export function isExitCommand(text: string): boolean {
  return EXIT_COMMANDS.has(text.trim().toLowerCase());
}

export const defaultNormalizer: InputNormalizer = {
  normalize: normalizeInput,
};
