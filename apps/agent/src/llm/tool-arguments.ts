// Complete `"key": "string"` or `"key": number` pairs. A trailing number is only
// taken once a delimiter follows it, since a cut-off reply may have truncated it.
const SCALAR_FIELD = /"(\w+)"\s*:\s*("(?:[^"\\]|\\.)*"|-?\d+(?:\.\d+)?(?=\s*[,}\]]))/g;

export const salvageToolArguments = (text: string): string => {
  const recovered: Record<string, unknown> = {};
  for (const [, key, value] of text.matchAll(SCALAR_FIELD)) {
    if (Object.hasOwn(recovered, key)) {
      continue;
    }
    try {
      recovered[key] = JSON.parse(value);
    } catch {
      // Invalid escape sequence; the field stays unset.
    }
  }
  return JSON.stringify(recovered);
};
