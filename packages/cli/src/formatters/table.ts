import { stripVTControlCharacters } from "node:util";

/**
 * Width of `text` as shown in a terminal, ignoring color codes
 */
export function visibleWidth(text: string): number {
  return stripVTControlCharacters(text).length;
}

export function pad(value: string, width: number): string {
  const current = visibleWidth(value);
  if (current >= width) {
    return value;
  }
  return value + " ".repeat(width - current);
}

/**
 * Greedy word wrap; words longer than `width` stay whole
 */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = "";

  for (const word of text.split(" ")) {
    if (current.length === 0) {
      current = word;
    } else if (current.length + 1 + word.length > width) {
      lines.push(current);
      current = word;
    } else {
      current += ` ${word}`;
    }
  }
  lines.push(current);

  return lines;
}

/**
 * Bordered table whose cells may span several lines
 */
export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = headers.map((header, column) =>
    Math.max(
      visibleWidth(header),
      ...rows.flatMap((row) => (row[column] ?? "").split("\n").map(visibleWidth))
    )
  );
  const border = `+${widths.map((width) => "-".repeat(width + 2)).join("+")}+`;

  const renderRow = (cells: readonly string[]): string[] => {
    const cellLines = widths.map((_, column) => (cells[column] ?? "").split("\n"));
    const height = Math.max(...cellLines.map((lines) => lines.length));
    const lines: string[] = [];
    for (let index = 0; index < height; index++) {
      const rendered = widths.map((width, column) => pad(cellLines[column]?.[index] ?? "", width));
      lines.push(`| ${rendered.join(" | ")} |`);
    }
    return lines;
  };

  const lines = [border, ...renderRow(headers), border];
  for (const row of rows) {
    lines.push(...renderRow(row), border);
  }
  return lines.join("\n");
}
