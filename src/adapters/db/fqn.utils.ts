const IDENTIFIER_PATTERN = /^[a-z_][a-z0-9_]*$/i;

/** Split `schema.table` and validate both parts as plain SQL identifiers. */
export function normalizeTableFqn(fqn: string): { schema: string; table: string; identifier: string } {
  const parts = fqn.trim().split('.');
  if (parts.length !== 2) {
    throw new Error(`Invalid table FQN: ${fqn}. Expected schema.table.`);
  }
  const [schema, table] = parts;
  if (!IDENTIFIER_PATTERN.test(schema) || !IDENTIFIER_PATTERN.test(table)) {
    throw new Error(`Invalid table FQN: ${fqn}. Schema and table must be plain identifiers.`);
  }
  return { schema, table, identifier: `${schema}.${table}` };
}
