export function renderTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, idx) => {
    const cellLengths = rows.map((row) => (row[idx] ?? '').length);
    return Math.max(header.length, ...cellLengths);
  });

  const renderRow = (cells: string[]) =>
    widths
      .map((width, idx) => (cells[idx] ?? '').padEnd(width))
      .join('  ')
      .trimEnd();

  const headerLine = renderRow(headers);
  const divider = widths.map((width) => '-'.repeat(width)).join('  ');
  return [headerLine, divider, ...rows.map(renderRow)].join('\n');
}
