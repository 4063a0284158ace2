import { describe, expect, it } from "vitest";
import { applyMenuItemEdit, priceOptionCount } from "./editor";
import { EditCoercionError } from "./errors";
import type { MenuItem } from "../types";

function item(overrides: Partial<MenuItem> = {}): MenuItem {
  return {
    id: "item-1",
    source: "mains.pdf (page 1/2)",
    name: "Paneer Tikka",
    prices: [120, 200],
    price_labels: ["Half", "Full"],
    description: "Grilled paneer",
    dietary_label: "veg",
    flags: [],
    ...overrides,
  };
}

describe("applyMenuItemEdit", () => {
  it("updates a price from typed text", () => {
    const updated = applyMenuItemEdit(item(), { kind: "price", index: 1, value: "₹220" });

    expect(updated.prices).toEqual([120, 220]);
    expect(updated.flags).toEqual([]);
  });

  it("rejects a non-numeric price and leaves the item untouched", () => {
    const original = item();

    expect(() =>
      applyMenuItemEdit(original, { kind: "price", index: 0, value: "cheap" }),
    ).toThrow(EditCoercionError);
    expect(original.prices).toEqual([120, 200]);
  });

  it("normalises dietary labels and rejects unknown ones", () => {
    expect(
      applyMenuItemEdit(item(), { kind: "dietary_label", value: "Non Veg" }).dietary_label,
    ).toBe("non-veg");
    expect(() =>
      applyMenuItemEdit(item(), { kind: "dietary_label", value: "halal" }),
    ).toThrow('"halal" is not a dietary label. Use veg, non-veg, spicy or unknown.');
  });

  it("recomputes flags after each edit", () => {
    const mismatched = item({
      price_labels: ["Half"],
      flags: ["Price count (2) does not match label count (1)."],
    });

    const fixed = applyMenuItemEdit(mismatched, {
      kind: "price_label",
      index: 1,
      value: " Full ",
    });

    expect(fixed.price_labels).toEqual(["Half", "Full"]);
    expect(fixed.flags).toEqual([]);
    expect(applyMenuItemEdit(fixed, { kind: "name", value: "  " }).flags).toEqual([
      "Name is empty.",
    ]);
  });

  it("refuses an index past the end of the list", () => {
    expect(() =>
      applyMenuItemEdit(item(), { kind: "price", index: 5, value: "10" }),
    ).toThrow("price option 6 does not exist.");
  });

  it("adds and removes whole price options", () => {
    const added = applyMenuItemEdit(item(), { kind: "add_price_option" });
    expect(added.prices).toEqual([120, 200, 0]);
    expect(added.price_labels).toEqual(["Half", "Full", ""]);
    expect(priceOptionCount(added)).toBe(3);

    const removed = applyMenuItemEdit(added, { kind: "remove_price_option", index: 0 });
    expect(removed.prices).toEqual([200, 0]);
    expect(removed.price_labels).toEqual(["Full", ""]);
  });
});
