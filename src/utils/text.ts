const SPACE_PATTERN = /\s+/g;
const LIKE_SPECIALS = /[\\%_]/g;

export function normalizeWhitespace(value: string): string {
  return value.replace(SPACE_PATTERN, ' ').trim();
}

export function blankToNull(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** Escapes a user fragment for `LIKE ? ESCAPE '\'`. */
export function escapeLikePattern(fragment: string): string {
  return fragment.replace(LIKE_SPECIALS, (match) => `\\${match}`);
}
