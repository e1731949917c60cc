/** Theme helpers for CLI output. */
export const theme = {
  success: (s: string) => `\x1b[32m${s}\x1b[0m`,
  heading: (s: string) => `\x1b[1m${s}\x1b[0m`,
} as const;

/** Left-aligned text table with a header row and a rule under it. */
export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
  const widths = headers.map((header, i) => Math.max(header.length, ...rows.map((row) => (row[i] ?? "").length)));
  const line = (cells: readonly string[]) =>
    cells
      .map((cell, i) => cell.padEnd(widths[i]))
      .join("  ")
      .trimEnd();
  return [line(headers), widths.map((w) => "-".repeat(w)).join("  "), ...rows.map(line)];
}
