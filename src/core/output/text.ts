/** Trim surrounding whitespace. */
export function strip(input: string): string {
  return input.trim();
}

/** Remove one trailing line terminator (`\r\n` or `\n`). */
export function chomp(input: string): string {
  if (input.endsWith("\r\n")) return input.slice(0, -2);
  if (input.endsWith("\n")) return input.slice(0, -1);
  return input;
}

/** Remove one leading line terminator (`\r\n` or `\n`). */
export function chompLeading(input: string): string {
  if (input.startsWith("\r\n")) return input.slice(2);
  if (input.startsWith("\n")) return input.slice(1);
  return input;
}
