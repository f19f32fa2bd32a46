/**
 * The JSON array embedded in a tool's stdout.
 *
 * The list tool prints log lines around its payload, so the payload is
 * taken from the first "[" to the last "]". Output without such a span
 * is read as an empty list.
 */
export function extractJsonArray(stdout: string): string {
  const start = stdout.indexOf('[');
  const end = stdout.lastIndexOf(']');
  if (start < 0 || end <= start) {
    return '[]';
  }
  return stdout.substring(start, end + 1);
}
