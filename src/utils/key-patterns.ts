/**
 * Identifier key detection
 */

export const GENERATED_ID_SUFFIX = "GeneratedId";

/**
 * Identifier patterns in precedence order.
 * A key ending in "ID" wins over one ending in "Id" after the exact matches.
 */
const ID_KEY_PATTERNS: RegExp[] = [
  /^.+GeneratedId$/,
  /^[iI][dD]$/,
  /^.+[a-z]ID$/,
  /^.+Id$/,
];

/**
 * Build the generated identifier key for rows extracted from `key`
 *
 * @example
 * generatedIdKey("Phones") // Returns: "PhonesGeneratedId"
 */
export function generatedIdKey(key: string): string {
  return `${key}${GENERATED_ID_SUFFIX}`;
}

export function isGeneratedIdKey(key: string): boolean {
  return key.length > GENERATED_ID_SUFFIX.length && key.endsWith(GENERATED_ID_SUFFIX);
}

/**
 * Check whether a key looks like an identifier (Id, ...Id, ...ID, ...GeneratedId)
 */
export function isIdentifierKey(key: string): boolean {
  return ID_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Singular form used when matching "<Owner>Id" keys: "Phones" → "Phone"
 */
export function singularize(key: string): string {
  if (key.endsWith("ies") && key.length > 3) {
    return `${key.slice(0, -3)}y`;
  }
  if (key.endsWith("s") && !key.endsWith("ss") && key.length > 1) {
    return key.slice(0, -1);
  }
  return key;
}

/**
 * Keys that name the natural identity of an object owned by `owner`
 *
 * @example
 * naturalIdKeys("Individual")
 * // Returns: ["Id", "ID", "IndividualId", "IndividualID"]
 */
export function naturalIdKeys(owner: string | null): string[] {
  const keys = ["Id", "ID"];
  if (!owner) {
    return keys;
  }
  const owners = [owner];
  const singular = singularize(owner);
  if (singular !== owner) {
    owners.push(singular);
  }
  for (const name of owners) {
    keys.push(`${name}Id`, `${name}ID`);
  }
  return keys;
}

/**
 * Order candidate primary key columns for a table.
 * Generated ids first, then the natural identity keys of the owner, then any identifier-looking key.
 *
 * @param keys - Column names of the table in their column order
 * @param owner - Key the table rows were extracted from (null for the root table)
 */
export function rankIdentifierKeys(keys: string[], owner: string | null): string[] {
  const ranked: string[] = [];
  const push = (key: string): void => {
    if (!ranked.includes(key)) {
      ranked.push(key);
    }
  };

  for (const key of keys) {
    if (isGeneratedIdKey(key)) push(key);
  }
  for (const natural of naturalIdKeys(owner)) {
    if (keys.includes(natural)) push(natural);
  }
  for (const pattern of ID_KEY_PATTERNS.slice(2)) {
    for (const key of keys) {
      if (pattern.test(key)) push(key);
    }
  }
  return ranked;
}
