export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return "NULL";
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString("utf8");
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Fixed-width bordered table:
 *
 *   +----+-------+
 *   | id | name  |
 *   +----+-------+
 *   | 1  | alice |
 *   +----+-------+
 */
export function formatTable(columns: string[], rows: unknown[][]): string[] {
  const cells = rows.map((row) => columns.map((_, i) => formatCell(row[i])));

  const widths = columns.map(width);
  for (const row of cells) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, width(cell));
    });
  }

  const sep = "+" + widths.map((w) => "-".repeat(w + 2) + "+").join("");
  const line = (row: string[]) =>
    "|" + row.map((cell, i) => ` ${pad(cell, widths[i] ?? 0)} |`).join("");

  return [sep, line(columns), sep, ...cells.map(line), sep];
}

// Code points, so an astral character takes one column.
function width(s: string): number {
  return [...s].length;
}

function pad(s: string, w: number): string {
  return s + " ".repeat(Math.max(0, w - width(s)));
}
