import { createId } from "./log";
import type { DietaryLabel, MenuItem } from "../types";

export const DIETARY_LABELS: DietaryLabel[] = ["veg", "non-veg", "spicy", "unknown"];

const DIETARY_ALIASES: Record<string, DietaryLabel> = {
  veg: "veg",
  vegetarian: "veg",
  vegan: "veg",
  v: "veg",
  "non-veg": "non-veg",
  nonveg: "non-veg",
  "non-vegetarian": "non-veg",
  nonvegetarian: "non-veg",
  meat: "non-veg",
  spicy: "spicy",
  hot: "spicy",
  unknown: "unknown",
};

export interface MenuDecodeResult {
  items: MenuItem[];
  rejected: string[];
  warnings: string[];
}

type MenuItemFields = Omit<MenuItem, "id" | "source" | "flags">;

export function normalizeDietaryLabel(value: unknown): DietaryLabel | null {
  if (typeof value !== "string") return null;
  const key = value.trim().toLowerCase().replace(/[\s_]+/g, "-");
  return DIETARY_ALIASES[key] ?? null;
}

/**
 * Parses a price as printed on a menu or typed into the grid. Currency
 * symbols, spaces and thousands separators are ignored; negative values are
 * not prices.
 */
export function parsePrice(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  if (typeof value !== "string") return null;

  const cleaned = value.replace(/[\s,₹$€£¥]/g, "").replace(/^(rs\.?|inr)/i, "");
  if (!/^\d+(\.\d+)?$|^\.\d+$/.test(cleaned)) return null;
  return Number(cleaned);
}

const MISMATCH_FLAG = /Price count \(\d+\) does not match label count \((\d+)\)\./;

export function validateMenuItem(item: MenuItemFields): string[] {
  const flags: string[] = [];
  if (!item.name.trim()) {
    flags.push("Name is empty.");
  }
  if (item.prices.length !== item.price_labels.length) {
    flags.push(
      `Price count (${item.prices.length}) does not match label count (${item.price_labels.length}).`,
    );
  }
  return flags;
}

/** The label count a mismatch flag records, or null when there is none. */
export function flaggedLabelCount(flags: string): number | null {
  const match = MISMATCH_FLAG.exec(flags);
  return match ? Number(match[1]) : null;
}

export function withFlags(item: Omit<MenuItem, "flags">): MenuItem {
  return { ...item, flags: validateMenuItem(item) };
}

function extractFencedJson(raw: string): string | null {
  const fencedMatch = raw.match(/```(?:json)?\s*([\s\S]*?)```/i);
  return fencedMatch?.[1]?.trim() || null;
}

function tryParse(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * Pulls the JSON payload out of free-form model output: a fenced block, the
 * whole text, or the outermost array or object embedded in prose.
 */
export function extractJsonPayload(raw: string): unknown {
  const candidates: string[] = [];
  const fenced = extractFencedJson(raw);
  if (fenced) candidates.push(fenced);
  candidates.push(raw.trim());

  const arrayStart = raw.indexOf("[");
  const arrayEnd = raw.lastIndexOf("]");
  if (arrayStart >= 0 && arrayEnd > arrayStart) {
    candidates.push(raw.slice(arrayStart, arrayEnd + 1));
  }
  const objectStart = raw.indexOf("{");
  const objectEnd = raw.lastIndexOf("}");
  if (objectStart >= 0 && objectEnd > objectStart) {
    candidates.push(raw.slice(objectStart, objectEnd + 1));
  }

  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (parsed !== undefined) return parsed;
  }
  throw new Error("Model output did not contain JSON.");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function recordList(raw: unknown): unknown[] {
  if (Array.isArray(raw)) return raw;
  if (isRecord(raw)) {
    if (Array.isArray(raw.items)) return raw.items;
    if (Array.isArray(raw.menu_items)) return raw.menu_items;
  }
  throw new Error(
    'Expected a JSON array of menu items or an object with an "items" array.',
  );
}

function decodeDietaryLabel(record: Record<string, unknown>): DietaryLabel {
  const direct = normalizeDietaryLabel(record.dietary_label);
  if (direct) return direct;
  if (Array.isArray(record.labels)) {
    for (const label of record.labels) {
      const normalized = normalizeDietaryLabel(label);
      if (normalized) return normalized;
    }
  }
  return "unknown";
}

function decodeRecord(
  record: Record<string, unknown>,
  itemName: string,
  warnings: string[],
): MenuItemFields {
  const rawPrices: unknown[] = Array.isArray(record.prices)
    ? record.prices
    : record.price !== undefined
      ? [record.price]
      : [];
  const rawLabels = Array.isArray(record.price_labels)
    ? record.price_labels
    : Array.isArray(record.priceLabels)
      ? record.priceLabels
      : null;

  const prices: number[] = [];
  rawPrices.forEach((value) => {
    const price = parsePrice(value);
    if (price === null) {
      warnings.push(`${itemName}: dropped non-numeric price ${JSON.stringify(value)}.`);
      return;
    }
    prices.push(price);
  });

  let priceLabels: string[];
  if (rawLabels) {
    priceLabels = rawLabels.map((label) =>
      typeof label === "string" || typeof label === "number"
        ? String(label).trim()
        : "",
    );
  } else {
    // A single unlabeled price is the common case on printed menus.
    priceLabels = prices.length === 1 ? [""] : [];
  }

  return {
    name: itemName,
    prices,
    price_labels: priceLabels,
    description:
      typeof record.description === "string" ? record.description.trim() : "",
    dietary_label: decodeDietaryLabel(record),
  };
}

/**
 * Decodes parsed model or import JSON into menu items. Records without a
 * usable name are rejected; records that decode but break an invariant are
 * kept and carry flags.
 */
export function decodeMenuRecords(raw: unknown, source: string): MenuDecodeResult {
  const records = recordList(raw);
  const items: MenuItem[] = [];
  const rejected: string[] = [];
  const warnings: string[] = [];

  records.forEach((entry, index) => {
    if (!isRecord(entry)) {
      rejected.push(`Record ${index + 1} is not an object.`);
      return;
    }
    const name = typeof entry.name === "string" ? entry.name.trim() : "";
    if (!name) {
      rejected.push(`Record ${index + 1} has no name.`);
      return;
    }

    items.push(
      withFlags({
        id: createId(),
        source,
        ...decodeRecord(entry, name, warnings),
      }),
    );
  });

  return { items, rejected, warnings };
}
