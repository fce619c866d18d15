const SLUG_SUFFIX_LENGTH = 8;

export const normalizeSlugSource = (value: string): string =>
  value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

/**
 * Builds `<normalized-title>-<first 8 chars of id>`. Uniqueness comes from the
 * id; the unique index on `slug` is the only hard guarantee.
 */
export const createSlug = (title: string, id: string): string => {
  const suffix = id.slice(0, SLUG_SUFFIX_LENGTH);
  const base = normalizeSlugSource(title);

  return base ? `${base}-${suffix}` : suffix;
};
