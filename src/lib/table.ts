export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  if (rows.length === 0) {
    return "";
  }

  const widths = headers.map((header, idx) => {
    const cellLengths = rows.map((row) => (row[idx] ?? "").length);
    return Math.max(header.length, ...cellLengths);
  });

  const renderRow = (cells: readonly string[]): string =>
    widths
      .map((width, idx) => (cells[idx] ?? "").padEnd(width))
      .join("  ")
      .trimEnd();

  const divider = widths.map((width) => "-".repeat(width)).join("  ");
  const body = rows.map(renderRow).join("\n");

  return `${renderRow(headers)}\n${divider}\n${body}`;
}
