/** Remove one pair of matching surrounding quotes. */
export function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && (trimmed[0] === '"' || trimmed[0] === "'") && trimmed[trimmed.length - 1] === trimmed[0]) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

/** Strip sentence punctuation and quotes from a path token. `..` and `a.txt` survive intact. */
export function cleanPathToken(token: string): string {
  const stripped = token
    .trim()
    .replace(/[,;:!?]+$/, "")
    .replace(/(?<=[\w"'])\.$/, "");
  return unquote(stripped).trim();
}

/** A bare word, or one quoted string that may contain spaces. */
export function isSingleToken(value: string): boolean {
  return /^("[^"]+"|'[^']+'|\S+)$/.test(value.trim());
}

export function hasPathShape(token: string): boolean {
  return /^(~\/|\/|\.\/|\.\.\/)/.test(token) || /[\\/]/.test(token) || /\.[A-Za-z0-9]+$/.test(token);
}

const CURRENT_DIRECTORY_PHRASE = /^(?:the\s+)?(?:current|this|working)\s+(?:directory|folder|dir)$/i;

/** Map phrases such as "the current directory" to ".". */
export function normalizeDirectoryPhrase(path: string): string {
  return CURRENT_DIRECTORY_PHRASE.test(path) ? "." : path;
}
