/**
 * Identifier and literal quoting for generated statements.
 *
 * Matches the escaping pg's client applies, so planned SQL is the same
 * whether or not a connection is at hand.
 */

export function quoteIdentifier(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
  if (value.includes('\\')) {
    return `E'${value.replace(/\\/g, '\\\\').replace(/'/g, "''")}'`;
  }
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * `"schema"."name"`
 */
export function qualify(schema: string, name: string): string {
  return `${quoteIdentifier(schema)}.${quoteIdentifier(name)}`;
}
