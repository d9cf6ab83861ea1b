/**
 * Splits one table line into named fields. Commas inside double-quoted
 * sections do not separate fields, and doubled quotes inside a quoted
 * section are kept as two characters. Field text is returned raw: quotes
 * stay in place and only the line terminator is removed.
 *
 * Returns undefined for a row that does not yield exactly `keys.length`
 * fields or that leaves a quoted section open.
 */
export function parseCsvRow<K extends string>(line: string, keys: readonly K[]): Record<K, string> | undefined {
  const text = line.replace(/\r?\n$/, '');
  if (!text.trim()) return undefined;

  const fields: string[] = [];
  let current = '';
  let quoted = false;
  for (const ch of text) {
    if (ch === '"') {
      quoted = !quoted;
      current += ch;
    } else if (ch === ',' && !quoted) {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  if (quoted) return undefined;
  fields.push(current);
  if (fields.length !== keys.length) return undefined;

  const row: Partial<Record<K, string>> = {};
  keys.forEach((key, i) => {
    row[key] = fields[i];
  });
  return isComplete(row, keys) ? row : undefined;
}

function isComplete<K extends string>(row: Partial<Record<K, string>>, keys: readonly K[]): row is Record<K, string> {
  return keys.every(key => typeof row[key] === 'string');
}
