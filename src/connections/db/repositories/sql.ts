/**
 * JSONB parameters are sent as text; pg would otherwise turn arrays into
 * Postgres array literals.
 */
export const toJson = (value: unknown): string | null =>
  value === undefined || value === null ? null : JSON.stringify(value);

export const lockClause = (forUpdate: boolean | undefined, table?: string): string => {
  if (!forUpdate) {
    return '';
  }
  return table ? ` FOR UPDATE OF ${table}` : ' FOR UPDATE';
};

/**
 * Collects positional parameters while a WHERE or SET clause is assembled.
 */
export class SqlParams {
  readonly values: unknown[] = [];

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}
