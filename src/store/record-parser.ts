/**
 * Parses the text form of a PostgreSQL composite value, e.g.
 * `(42,"Main St, 3",,t)` → `['42', 'Main St, 3', null, 't']`.
 *
 * An empty field is NULL, `""` is the empty string. Inside quotes `""` and
 * `\"` stand for a double quote and `\\` for a backslash. Nested composites
 * come back as their own quoted text, to be parsed again.
 */
export function parseRecord(text: string): (string | null)[] {
  const input = text.trim();
  if (!input.startsWith('(') || !input.endsWith(')')) {
    throw new SyntaxError(`Not a composite value: ${text}`);
  }

  const fields: (string | null)[] = [];
  let i = 1;
  const end = input.length - 1;

  while (true) {
    let value = '';
    let quoted = false;

    while (i < end && input[i] !== ',') {
      const ch = input[i] ?? '';
      if (ch === '"') {
        quoted = true;
        i++;
        while (true) {
          if (i >= end) throw new SyntaxError(`Unterminated quoted field in: ${text}`);
          const q = input[i] ?? '';
          if (q === '\\') {
            value += input[i + 1] ?? '';
            i += 2;
          } else if (q === '"' && input[i + 1] === '"') {
            value += '"';
            i += 2;
          } else if (q === '"') {
            i++;
            break;
          } else {
            value += q;
            i++;
          }
        }
      } else if (ch === '\\') {
        value += input[i + 1] ?? '';
        i += 2;
      } else {
        value += ch;
        i++;
      }
    }

    fields.push(value === '' && !quoted ? null : value);
    if (i >= end) break;
    i++; // skip ','
  }

  return fields;
}
