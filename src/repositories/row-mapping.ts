/**
 * Narrow a text column to a member of a string enum
 */
export function toEnum<E extends Record<string, string>>(values: E, raw: string, column: string): E[keyof E] {
  const match = Object.values(values).find((value): value is E[keyof E] => value === raw);
  if (match === undefined) {
    throw new Error(`Unexpected ${column} value: ${raw}`);
  }
  return match;
}

// NUMERIC columns arrive from pg as strings
export function toAmount(raw: string): number {
  return Number(raw);
}

// Single row expected from an INSERT/UPDATE ... RETURNING
export function firstRow<T>(rows: T[], table: string): T {
  const row = rows[0];
  if (!row) {
    throw new Error(`Expected a row from ${table}`);
  }
  return row;
}

/**
 * SET clause for the defined fields of `patch`. Values are appended to
 * `values` so placeholders continue from whatever is already there.
 */
export function patchAssignments<P extends object>(
  patch: P,
  columns: Record<keyof P, string>,
  values: unknown[]
): string {
  const assignments: string[] = ['updated_at = now()'];
  for (const [field, column] of Object.entries(columns)) {
    const value: unknown = Reflect.get(patch, field);
    if (value === undefined) continue;
    values.push(value);
    assignments.push(`${column} = $${values.length}`);
  }
  return assignments.join(', ');
}
