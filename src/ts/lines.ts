/**
 * Logical line splitting
 *
 * A newline ends a logical line only outside a quoted field. Quote
 * characters are kept in the output so the field tokenizer can decode them.
 */

export interface LineScan {
  lines: string[];
  /** 1-based index of the logical line left inside an open quote, if any */
  unterminatedQuoteLine: number | null;
}

/**
 * Split content into logical lines and report an unterminated quote.
 * Carriage returns are removed first, so `\r\n` counts as a line break.
 */
export function scanLogicalLines(content: string, quoteChar: string): LineScan {
  const text = content.replaceAll("\r", "");
  const lines: string[] = [];
  let current = "";
  let inQuote = false;
  let i = 0;

  while (i < text.length) {
    const c = text[i];

    if (inQuote) {
      if (c === quoteChar) {
        // Doubled quote: pass both through, the tokenizer collapses them
        if (text[i + 1] === quoteChar) {
          current += quoteChar + quoteChar;
          i += 2;
          continue;
        }
        inQuote = false;
      }
      current += c;
    } else if (c === quoteChar) {
      current += c;
      inQuote = true;
    } else if (c === "\n") {
      lines.push(current);
      current = "";
    } else {
      current += c;
    }
    i++;
  }

  lines.push(current);

  return {
    lines,
    unterminatedQuoteLine: inQuote ? lines.length : null,
  };
}

/** Split content into logical lines. The last (possibly empty) line is always included. */
export function splitLogicalLines(content: string, quoteChar: string): string[] {
  return scanLogicalLines(content, quoteChar).lines;
}
