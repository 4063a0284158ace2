import { EditCoercionError } from "./errors";
import { normalizeDietaryLabel, parsePrice, withFlags } from "./menuItems";
import type { MenuItem } from "../types";

export type MenuItemEdit =
  | { kind: "name"; value: string }
  | { kind: "description"; value: string }
  | { kind: "dietary_label"; value: string }
  | { kind: "price"; index: number; value: string }
  | { kind: "price_label"; index: number; value: string }
  | { kind: "add_price_option" }
  | { kind: "remove_price_option"; index: number };

function replaceAt<T>(
  values: T[],
  index: number,
  value: T,
  field: string,
  raw: string,
): T[] {
  // One past the end appends, so a short list can be completed from the grid.
  if (!Number.isInteger(index) || index < 0 || index > values.length) {
    throw new EditCoercionError(
      field,
      raw,
      `${field} option ${index + 1} does not exist.`,
    );
  }
  const next = [...values];
  next[index] = value;
  return next;
}

/**
 * Applies one grid edit and returns the updated item with recomputed flags.
 * Throws EditCoercionError when the value cannot be coerced; the input item
 * is never modified.
 */
export function applyMenuItemEdit(item: MenuItem, edit: MenuItemEdit): MenuItem {
  switch (edit.kind) {
    case "name":
      return withFlags({ ...item, name: edit.value.trim() });
    case "description":
      return withFlags({ ...item, description: edit.value.trim() });
    case "dietary_label": {
      const label = normalizeDietaryLabel(edit.value);
      if (!label) {
        throw new EditCoercionError(
          "dietary_label",
          edit.value,
          `"${edit.value}" is not a dietary label. Use veg, non-veg, spicy or unknown.`,
        );
      }
      return withFlags({ ...item, dietary_label: label });
    }
    case "price": {
      const price = parsePrice(edit.value);
      if (price === null) {
        throw new EditCoercionError(
          "price",
          edit.value,
          `"${edit.value}" is not a valid price.`,
        );
      }
      return withFlags({
        ...item,
        prices: replaceAt(item.prices, edit.index, price, "price", edit.value),
      });
    }
    case "price_label":
      return withFlags({
        ...item,
        price_labels: replaceAt(
          item.price_labels,
          edit.index,
          edit.value.trim(),
          "price_label",
          edit.value,
        ),
      });
    case "add_price_option":
      return withFlags({
        ...item,
        prices: [...item.prices, 0],
        price_labels: [...item.price_labels, ""],
      });
    case "remove_price_option":
      return withFlags({
        ...item,
        prices: item.prices.filter((_, index) => index !== edit.index),
        price_labels: item.price_labels.filter((_, index) => index !== edit.index),
      });
  }
}

export function priceOptionCount(item: MenuItem): number {
  return Math.max(item.prices.length, item.price_labels.length);
}
