/**
 * Collapses runs of identical neighbouring cells into one spanning cell.
 */
export interface NormalizedCell {
  text: string;
  span: number;
}

export function collapseRow(cells: readonly string[]): NormalizedCell[] {
  const result: NormalizedCell[] = [];
  for (const text of cells) {
    const last = result.at(-1);
    if (last && last.text === text) {
      last.span++;
    } else {
      result.push({ text, span: 1 });
    }
  }
  return result;
}

/**
 * Renders a table as self-contained HTML markup.
 * Returns undefined for a table without any text.
 */
export function normalizeTable(rows: readonly (readonly string[])[]): string | undefined {
  if (!rows.some((row) => row.some((cell) => cell.trim().length > 0))) {
    return undefined;
  }
  let html = '<table>';
  for (const row of rows) {
    html += '<tr>';
    for (const cell of collapseRow(row)) {
      html += cell.span === 1 ? `<td>${cell.text}</td>` : `<td colspan='${cell.span}'>${cell.text}</td>`;
    }
    html += '</tr>';
  }
  return `${html}</table>`;
}
