/**
 * Native table rendering.
 *
 * Rows come from `tbody` sections; `colspan` cells are expanded so every row
 * stays rectangular, with spans capped at 1000. When every row starts with a
 * `th`, that first column is bolded throughout, header row included.
 */

import { renderChildren, type ConversionContext, type ConvertFn, type Handler } from "../conversion.js";
import { attr, isElement, type StorageElement } from "../storage-tree.js";

interface TableCell {
  text: string;
  span: number;
  header: boolean;
}

type TableRow = TableCell[];

function collectRows(table: StorageElement): StorageElement[] {
  const bodies = table.children.filter((child): child is StorageElement => isElement(child, "tbody"));
  // htmlparser2 does not insert an implied tbody, so bare rows count as the body.
  const sections = bodies.length ? bodies : [table];
  return sections.flatMap((section) =>
    section.children.filter((child): child is StorageElement => isElement(child, "tr"))
  );
}

// Browsers cap colspan at 1000 as well.
const MAX_COLSPAN = 1000;

function cellText(cell: StorageElement, convert: ConvertFn, context: ConversionContext): string {
  context.cellDepth++;
  const rendered = renderChildren(cell, convert);
  context.cellDepth--;
  return rendered
    .replace(/\s+/g, " ")
    .trim()
    .replace(/\|/g, "\\|");
}

function readRow(tr: StorageElement, convert: ConvertFn, context: ConversionContext): TableRow {
  const cells: TableRow = [];
  for (const child of tr.children) {
    if (!isElement(child) || (child.name !== "td" && child.name !== "th")) continue;
    const span = Number.parseInt(attr(child, "colspan") ?? "1", 10);
    cells.push({
      text: cellText(child, convert, context),
      span: Number.isFinite(span) && span > 1 ? Math.min(span, MAX_COLSPAN) : 1,
      header: child.name === "th",
    });
  }
  return cells;
}

function expandRow(row: TableRow, boldFirstColumn: boolean): string[] {
  const out: string[] = [];
  row.forEach((cell, i) => {
    const text = boldFirstColumn && i === 0 && cell.text ? `**${cell.text}**` : cell.text;
    out.push(text);
    for (let k = 1; k < cell.span; k++) out.push("");
  });
  return out;
}

function formatRow(cells: string[]): string {
  return `| ${cells.join(" | ")} |`;
}

export const table: Handler = (node, convert, context) => {
  const rows = collectRows(node).map((tr) => readRow(tr, convert, context));
  if (rows.length === 0) return "";
  const firstColumnHeader = rows.every((row) => row[0]?.header === true);
  const expanded = rows.map((row) => expandRow(row, firstColumnHeader));
  const columns = Math.max(...expanded.map((cells) => cells.length));
  if (columns === 0) return "";
  const padded = expanded.map((cells) => cells.concat(Array<string>(columns - cells.length).fill("")));

  const [header = [], ...body] = padded;
  const lines = [formatRow(header), formatRow(Array<string>(columns).fill("---")), ...body.map(formatRow)];
  return lines.join("\n") + "\n\n";
};
