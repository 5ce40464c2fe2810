const width = (s: string) => Array.from(s).length;

/**
 * Renders rows as a rounded-outline table; the first row is the header.
 *
 * ```
 * ╭─────────┬─────────╮
 * │ index   │ title   │
 * ├─────────┼─────────┤
 * │ 0       │ Mail    │
 * ╰─────────┴─────────╯
 * ```
 */
export function renderTable(rows: readonly (readonly string[])[]): string {
  if (rows.length === 0) return "";

  const columns = Math.max(...rows.map((r) => r.length));
  const widths: number[] = [];
  for (let c = 0; c < columns; c++) {
    widths.push(Math.max(...rows.map((r) => width(r[c] ?? ""))));
  }

  const rule = (left: string, mid: string, right: string) =>
    left + widths.map((w) => "─".repeat(w + 2)).join(mid) + right;
  const line = (row: readonly string[]) =>
    "│" + widths.map((w, c) => {
      const cell = row[c] ?? "";
      return ` ${cell}${" ".repeat(w - width(cell))} `;
    }).join("│") + "│";

  const [header, ...body] = rows;
  return [
    rule("╭", "┬", "╮"),
    line(header),
    rule("├", "┼", "┤"),
    ...body.map(line),
    rule("╰", "┴", "╯")
  ].join("\n");
}
