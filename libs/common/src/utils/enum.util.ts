/**
 * Narrows a raw string (typically a database column) to one of `values`.
 */
export function parseEnumValue<T extends string>(values: readonly T[], raw: string, label: string): T {
  const match = values.find(value => value === raw);
  if (match === undefined) {
    throw new Error(`Unknown ${label}: ${raw}`);
  }
  return match;
}
