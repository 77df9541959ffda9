export const escapeRegex = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/** Keeps the first occurrence of each value, in input order. */
export const uniqueValues = <T>(values: readonly T[] | undefined): T[] =>
  values ? [...new Set(values)] : [];

/** Trims, drops empty strings, then de-duplicates. */
export const uniqueStrings = (values: readonly string[] | undefined): string[] =>
  uniqueValues((values ?? []).map((v) => v.trim()).filter((v) => v.length > 0));
