/**
 * Plain-text table rendering for console and tool output
 */

export type Cell = string | number;

export class TextTable {
  private columns: string[] = [];
  private rows: string[][] = [];

  setColumns(columns: string[]): this {
    this.columns = columns;
    return this;
  }

  addRow(row: Cell[]): this {
    this.rows.push(row.map((cell) => String(cell)));
    return this;
  }

  render(): string {
    const widths = this.columns.map((column, index) =>
      Math.max(column.length, ...this.rows.map((row) => (row[index] ?? '').length))
    );

    const border = `+${widths.map((w) => '-'.repeat(w + 2)).join('+')}+`;
    const line = (cells: string[]): string =>
      `| ${widths.map((w, index) => (cells[index] ?? '').padEnd(w)).join(' | ')} |`;

    return [border, line(this.columns), border, ...this.rows.map(line), border].join('\n');
  }
}
