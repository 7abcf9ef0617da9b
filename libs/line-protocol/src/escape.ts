const MEASUREMENT_SPECIALS = /[, ]/g;
const KEY_SPECIALS = /[,= ]/g;
const STRING_SPECIALS = /["\\]/g;

export function escapeMeasurement(value: string): string {
  return value.replace(MEASUREMENT_SPECIALS, "\\$&");
}

/** Tag keys, tag values and field keys share the same escaping rules. */
export function escapeKey(value: string): string {
  return value.replace(KEY_SPECIALS, "\\$&");
}

export function quoteString(value: string): string {
  return `"${value.replace(STRING_SPECIALS, "\\$&")}"`;
}

export function unescapeMeasurement(text: string): string {
  return unescapeChars(text, ", ");
}

export function unescapeKey(text: string): string {
  return unescapeChars(text, ",= ");
}

// A backslash in front of any other character is literal.
function unescapeChars(text: string, escapable: string): string {
  let out = "";
  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    const next = text[i + 1];
    if (ch === "\\" && next !== undefined && escapable.includes(next)) {
      out += next;
      i += 1;
    } else {
      out += ch;
    }
  }
  return out;
}

export function indexOfUnescaped(text: string, target: string, from = 0): number {
  for (let i = from; i < text.length; i += 1) {
    const ch = text[i];
    if (ch === "\\") {
      i += 1;
      continue;
    }
    if (ch === target) return i;
  }
  return -1;
}

export function splitUnescaped(text: string, separator: string): string[] {
  const parts: string[] = [];
  let start = 0;
  let at = indexOfUnescaped(text, separator, start);
  while (at !== -1) {
    parts.push(text.slice(start, at));
    start = at + 1;
    at = indexOfUnescaped(text, separator, start);
  }
  parts.push(text.slice(start));
  return parts;
}
