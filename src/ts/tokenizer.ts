/**
 * Field tokenizer for a single logical line
 */

/**
 * Split one logical line into fields.
 *
 * Quoted regions may contain the delimiter and newlines; `""` inside quotes
 * yields one literal quote. The last field is always emitted, so a line
 * without delimiters gives one field and a trailing delimiter gives a
 * trailing empty field.
 */
export function splitFields(line: string, delimiter: string, quoteChar: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuote = false;
  let i = 0;

  while (i < line.length) {
    const c = line[i];

    if (inQuote) {
      if (c === quoteChar) {
        if (line[i + 1] === quoteChar) {
          current += quoteChar;
          i += 2;
          continue;
        }
        inQuote = false;
      } else {
        current += c;
      }
      i++;
      continue;
    }

    if (c === quoteChar) {
      inQuote = true;
      i++;
    } else if (line.startsWith(delimiter, i)) {
      fields.push(current);
      current = "";
      i += delimiter.length;
    } else {
      current += c;
      i++;
    }
  }

  fields.push(current);
  return fields;
}
