import * as XLSX from "xlsx";
import { priceOptionCount } from "./editor";
import {
  decodeMenuRecords,
  flaggedLabelCount,
  type MenuDecodeResult,
} from "./menuItems";
import type { MenuItem } from "../types";

export type ExportFormat = "json" | "csv" | "xlsx";

export interface ExportDocument {
  fileName: string;
  mimeType: string;
  content: string | ArrayBuffer;
}

export interface MenuItemRecord {
  name: string;
  prices: number[];
  price_labels: string[];
  description: string;
  dietary_label: string;
}

type TableCell = string | number;

const EXPORT_BASENAME = "menu_data";

const LEADING_COLUMNS = ["name", "description", "dietary_label"] as const;

export function toMenuItemRecord(item: MenuItem): MenuItemRecord {
  return {
    name: item.name,
    prices: [...item.prices],
    price_labels: [...item.price_labels],
    description: item.description,
    dietary_label: item.dietary_label,
  };
}

export function menuItemsToJson(items: MenuItem[]): string {
  return JSON.stringify(items.map(toMenuItemRecord), null, 2);
}

function maxPriceOptions(items: MenuItem[]): number {
  return items.reduce((max, item) => Math.max(max, priceOptionCount(item)), 0);
}

function tableHeader(priceOptions: number): string[] {
  const header: string[] = [...LEADING_COLUMNS];
  for (let option = 1; option <= priceOptions; option += 1) {
    header.push(`price_label_${option}`, `price_${option}`);
  }
  header.push("flags");
  return header;
}

function tableRow(item: MenuItem, priceOptions: number): TableCell[] {
  const row: TableCell[] = [item.name, item.description, item.dietary_label];
  for (let index = 0; index < priceOptions; index += 1) {
    row.push(item.price_labels[index] ?? "", item.prices[index] ?? "");
  }
  row.push(item.flags.join("; "));
  return row;
}

function toCsvCell(value: TableCell): string {
  const text = String(value);
  if (/["\r\n,]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * One row per item; multiple prices become repeated label/price column pairs
 * sized to the item with the most options.
 */
export function menuItemsToCsv(items: MenuItem[]): string {
  const priceOptions = maxPriceOptions(items);
  return [
    tableHeader(priceOptions),
    ...items.map((item) => tableRow(item, priceOptions)),
  ]
    .map((row) => row.map(toCsvCell).join(","))
    .join("\n");
}

export function menuItemsToXlsx(items: MenuItem[]): ArrayBuffer {
  const priceOptions = maxPriceOptions(items);
  const worksheet = XLSX.utils.aoa_to_sheet([
    tableHeader(priceOptions),
    ...items.map((item) => tableRow(item, priceOptions)),
  ]);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, worksheet, "menu");
  const output: unknown = XLSX.write(workbook, { type: "array", bookType: "xlsx" });
  if (!(output instanceof ArrayBuffer)) {
    throw new Error("Spreadsheet writer did not return binary data.");
  }
  return output;
}

export function buildExportDocument(
  items: MenuItem[],
  format: ExportFormat,
): ExportDocument {
  switch (format) {
    case "json":
      return {
        fileName: `${EXPORT_BASENAME}.json`,
        mimeType: "application/json",
        content: menuItemsToJson(items),
      };
    case "csv":
      return {
        fileName: `${EXPORT_BASENAME}.csv`,
        mimeType: "text/csv;charset=utf-8;",
        content: menuItemsToCsv(items),
      };
    case "xlsx":
      return {
        fileName: `${EXPORT_BASENAME}.xlsx`,
        mimeType:
          "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
        content: menuItemsToXlsx(items),
      };
  }
}

/** Reads CSV text into rows of strings; blank rows are skipped. */
export function parseCsv(text: string): string[][] {
  // raw keeps cell text as written instead of guessing numbers and dates.
  const workbook = XLSX.read(text, { type: "string", raw: true });
  const firstSheet = workbook.SheetNames[0];
  const sheet = firstSheet ? workbook.Sheets[firstSheet] : undefined;
  if (!sheet) return [];

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: false,
    defval: "",
    blankrows: false,
  });
  return rows
    .map((row) => row.map((cell) => String(cell ?? "")))
    .filter((row) => row.some((value) => value.trim() !== ""));
}

export function parseMenuJson(text: string, source: string): MenuDecodeResult {
  const parsed: unknown = JSON.parse(text);
  return decodeMenuRecords(parsed, source);
}

export function parseMenuCsv(text: string, source: string): MenuDecodeResult {
  const [header, ...rows] = parseCsv(text);
  if (!header) {
    return { items: [], rejected: [], warnings: [] };
  }

  const columns = header.map((value) => value.trim().toLowerCase());
  const nameColumn = columns.indexOf("name");
  if (nameColumn < 0) {
    throw new Error('CSV is missing the "name" column.');
  }
  const descriptionColumn = columns.indexOf("description");
  const dietaryColumn = columns.indexOf("dietary_label");
  const flagsColumn = columns.indexOf("flags");

  const priceOptions: Array<{ option: number; label: number; price: number }> = [];
  columns.forEach((column, index) => {
    const match = /^price_(\d+)$/.exec(column);
    if (!match) return;
    const option = Number(match[1]);
    priceOptions.push({
      option,
      label: columns.indexOf(`price_label_${option}`),
      price: index,
    });
  });
  priceOptions.sort((a, b) => a.option - b.option);

  const records = rows.map((row) => {
    const cell = (index: number): string => (index >= 0 ? row[index] ?? "" : "");
    const prices: string[] = [];
    let priceLabels: string[] = [];
    for (const option of priceOptions) {
      const price = cell(option.price).trim();
      const label = cell(option.label).trim();
      if (price) prices.push(price);
      if (price || label) priceLabels.push(label);
    }
    // Mismatched rows keep the label count they were exported with; the
    // padding cells around them are not labels.
    const labelCount = flaggedLabelCount(cell(flagsColumn));
    if (labelCount !== null) {
      priceLabels = priceOptions
        .slice(0, labelCount)
        .map((option) => cell(option.label).trim());
    }
    return {
      name: cell(nameColumn),
      description: cell(descriptionColumn),
      dietary_label: cell(dietaryColumn),
      prices,
      price_labels: priceLabels,
    };
  });

  return decodeMenuRecords(records, source);
}

export function triggerDownload(blob: Blob, fileName: string): void {
  const url = URL.createObjectURL(blob);
  const anchor = document.createElement("a");
  anchor.href = url;
  anchor.download = fileName;
  document.body.appendChild(anchor);
  anchor.click();
  anchor.remove();
  URL.revokeObjectURL(url);
}

export function downloadExport(exported: ExportDocument): void {
  const blob = new Blob([exported.content], { type: exported.mimeType });
  triggerDownload(blob, exported.fileName);
}
