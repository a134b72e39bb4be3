/**
 * Parse a value that may be a JSON string or already a parsed object.
 *
 * MySQL/MariaDB and SQLite return JSON columns as strings with some driver
 * versions; PostgreSQL hands back parsed values.
 */
export function parseJson(value: unknown): unknown {
  if (typeof value === 'string') {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  }
  return value;
}
