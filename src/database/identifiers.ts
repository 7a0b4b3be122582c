/**
 * Quote a PostgreSQL identifier. Embedded double quotes are doubled.
 */
export function quoteIdent(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

/**
 * Schema-qualified, quoted table reference: "schema"."table"
 */
export function qualifiedName(schema: string, table: string): string {
  return `${quoteIdent(schema)}.${quoteIdent(table)}`;
}
