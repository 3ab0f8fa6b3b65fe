/** For INSERT ... RETURNING, which always yields the inserted row. */
export function firstRow<R>(rows: R[]): R {
  const row = rows[0];
  if (!row) throw new Error('Expected a row to be returned');
  return row;
}
