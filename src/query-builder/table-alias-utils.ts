/**
 * Creates a unique alias based on a base name, avoiding collisions with already-used names.
 */
export const makeUniqueAlias = (base: string, used: Set<string>): string => {
  let alias = base;
  let i = 2;
  while (used.has(alias)) alias = `${base}_${i++}`;
  return alias;
};

/**
 * Turns a relation name into an identifier-safe correlation base
 * (`reporting.Daily Sales` → `daily_sales`).
 */
export const toAliasBase = (name: string): string => {
  const cleaned = name.toLowerCase().replace(/[^a-z0-9_]+/g, '_').replace(/^_+|_+$/g, '');
  return cleaned || 't';
};
