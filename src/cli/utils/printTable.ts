/**
 * Table printer for CLI output
 */

export function printTable(headers: string[], rows: string[][], write: (line: string) => void = console.log): void {
  if (rows.length === 0) {
    write("No data to display");
    return;
  }

  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, colIndex) => Math.max(...allRows.map((row) => stripAnsi(row[colIndex] ?? "").length)));

  write(headers.map((header, i) => header.padEnd(colWidths[i])).join(" │ "));
  write(colWidths.map((width) => "─".repeat(width)).join("─┼─"));
  for (const row of rows) {
    write(row.map((cell, i) => (cell ?? "").padEnd(colWidths[i])).join(" │ "));
  }
}

/**
 * Strip ANSI escape codes for width calculation
 */
function stripAnsi(str: string): string {
  return str.replace(/\u001b\[[0-9;]*m/g, "");
}
