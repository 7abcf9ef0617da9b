import { ParseError } from "./errors";
import { splitUnescaped } from "./escape";
import { parseTagPair } from "./parser";

/** Parses `key=value[,key=value...]`, the form used to pass static tags. */
export function parseStaticTags(text: string): Map<string, string> {
  const tags = new Map<string, string>();
  const trimmed = text.trim();
  if (trimmed.length === 0) return tags;

  for (const part of splitUnescaped(trimmed, ",")) {
    const [key, value] = parseTagPair(part, trimmed);
    if (tags.has(key)) {
      throw new ParseError(`duplicate static tag '${key}'`, trimmed);
    }
    tags.set(key, value);
  }
  return tags;
}
