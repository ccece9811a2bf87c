/**
 * Build an evidence locator: `file`, `file#json.path` or `file#line:a-b`.
 */
export function formatEvidencePath(
  filePath: string,
  jsonPath?: string,
  lineRange?: readonly [start: number, end: number],
): string {
  if (jsonPath) return `${filePath}#${jsonPath}`;
  if (lineRange) return `${filePath}#line:${lineRange[0]}-${lineRange[1]}`;
  return filePath;
}
