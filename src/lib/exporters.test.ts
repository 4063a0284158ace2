import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import {
  buildExportDocument,
  menuItemsToCsv,
  menuItemsToJson,
  parseCsv,
  parseMenuCsv,
  parseMenuJson,
} from "./exporters";
import type { MenuItem } from "../types";

const items: MenuItem[] = [
  {
    id: "item-1",
    source: "starters.jpg",
    name: "Paneer Tikka",
    prices: [120, 200],
    price_labels: ["Half", "Full"],
    description: "Grilled paneer",
    dietary_label: "veg",
    flags: [],
  },
  {
    id: "item-2",
    source: "drinks.png",
    name: "Masala Chai",
    prices: [30],
    price_labels: [""],
    description: "Tea, spiced",
    dietary_label: "unknown",
    flags: [],
  },
];

describe("menuItemsToJson", () => {
  it("writes only the menu fields", () => {
    expect(JSON.parse(menuItemsToJson(items.slice(0, 1)))).toEqual([
      {
        name: "Paneer Tikka",
        prices: [120, 200],
        price_labels: ["Half", "Full"],
        description: "Grilled paneer",
        dietary_label: "veg",
      },
    ]);
  });

  it("is stable across export, import and export", () => {
    const exported = menuItemsToJson(items);
    const imported = parseMenuJson(exported, "menu_data.json");

    expect(imported.rejected).toEqual([]);
    expect(menuItemsToJson(imported.items)).toBe(exported);
  });
});

describe("menuItemsToCsv", () => {
  it("repeats label and price columns for the widest item", () => {
    expect(menuItemsToCsv(items)).toBe(
      [
        "name,description,dietary_label,price_label_1,price_1,price_label_2,price_2,flags",
        "Paneer Tikka,Grilled paneer,veg,Half,120,Full,200,",
        'Masala Chai,"Tea, spiced",unknown,,30,,,',
      ].join("\n"),
    );
  });

  it("writes the review flags", () => {
    const flagged: MenuItem = {
      ...items[0],
      price_labels: ["Half"],
      flags: ["Price count (2) does not match label count (1)."],
    };

    expect(menuItemsToCsv([flagged]).split("\n")[1]).toBe(
      "Paneer Tikka,Grilled paneer,veg,Half,120,,200,Price count (2) does not match label count (1).",
    );
  });

  it("round-trips every price and label through the CSV importer", () => {
    const imported = parseMenuCsv(menuItemsToCsv(items), "menu_data.csv");

    expect(
      imported.items.map(({ name, prices, price_labels, description, dietary_label }) => ({
        name,
        prices,
        price_labels,
        description,
        dietary_label,
      })),
    ).toEqual([
      {
        name: "Paneer Tikka",
        prices: [120, 200],
        price_labels: ["Half", "Full"],
        description: "Grilled paneer",
        dietary_label: "veg",
      },
      {
        name: "Masala Chai",
        prices: [30],
        price_labels: [""],
        description: "Tea, spiced",
        dietary_label: "unknown",
      },
    ]);
  });

  it("keeps a flagged row flagged across export, import and export", () => {
    const flagged: MenuItem[] = [
      {
        ...items[0],
        price_labels: ["Half"],
        flags: ["Price count (2) does not match label count (1)."],
      },
      {
        ...items[1],
        prices: [30, 45],
        price_labels: [""],
        flags: ["Price count (2) does not match label count (1)."],
      },
    ];
    const exported = menuItemsToCsv(flagged);

    const imported = parseMenuCsv(exported, "menu_data.csv");

    expect(imported.items.map((item) => item.price_labels)).toEqual([["Half"], [""]]);
    expect(imported.items.map((item) => item.flags)).toEqual([
      ["Price count (2) does not match label count (1)."],
      ["Price count (2) does not match label count (1)."],
    ]);
    expect(menuItemsToCsv(imported.items)).toBe(exported);
  });

  it("refuses a CSV without a name column", () => {
    expect(() => parseMenuCsv("dish,price_1\nTea,10", "x.csv")).toThrow(
      'CSV is missing the "name" column.',
    );
  });
});

describe("parseCsv", () => {
  it("handles quotes, embedded commas and blank rows", () => {
    expect(parseCsv('a,"b ""q""",c\n\nd,"e, f",g')).toEqual([
      ["a", 'b "q"', "c"],
      ["d", "e, f", "g"],
    ]);
  });

  it("keeps numbers and dates as the text that was written", () => {
    expect(parseCsv("name,price_1\nThali,0120\nSpecial,1/2")).toEqual([
      ["name", "price_1"],
      ["Thali", "0120"],
      ["Special", "1/2"],
    ]);
  });
});

describe("buildExportDocument", () => {
  it("names each download after the format", () => {
    expect(buildExportDocument(items, "json")).toMatchObject({
      fileName: "menu_data.json",
      mimeType: "application/json",
    });
    expect(buildExportDocument(items, "csv")).toMatchObject({
      fileName: "menu_data.csv",
      mimeType: "text/csv;charset=utf-8;",
    });
  });

  it("writes a workbook with the same table as the CSV", () => {
    const exported = buildExportDocument(items, "xlsx");
    expect(exported.fileName).toBe("menu_data.xlsx");
    expect(exported.content).toBeInstanceOf(ArrayBuffer);
    if (!(exported.content instanceof ArrayBuffer)) return;

    const workbook = XLSX.read(new Uint8Array(exported.content), { type: "array" });
    expect(workbook.SheetNames).toEqual(["menu"]);
    const rows = XLSX.utils.sheet_to_json<Array<string | number>>(
      workbook.Sheets.menu,
      { header: 1 },
    );

    expect(rows[0]).toEqual([
      "name",
      "description",
      "dietary_label",
      "price_label_1",
      "price_1",
      "price_label_2",
      "price_2",
      "flags",
    ]);
    expect(rows[1].slice(0, 7)).toEqual([
      "Paneer Tikka",
      "Grilled paneer",
      "veg",
      "Half",
      120,
      "Full",
      200,
    ]);
  });
});
