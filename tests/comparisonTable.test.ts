import { describe, it, expect } from "vitest";
import { buildComparisonTable } from "../services/comparisonTable.js";

describe("buildComparisonTable", () => {
  it("puts attributes in rows and parts in columns, filling gaps with '-'", () => {
    const table = buildComparisonTable([
      { "Part Number": "MLX90393", "Mfr": "Melexis", "Part Status": "Active", "Interface": "I2C, SPI" },
      { "Part Number": "HMC5883L", "Mfr": "Honeywell", "Part Status": "Obsolete", "Axis": "X, Y, Z" }
    ]);

    expect(table.columns).toEqual(["Attribute", "MLX90393", "HMC5883L"]);
    expect(table.rows).toEqual([
      { Attribute: "Part Number", MLX90393: "MLX90393", HMC5883L: "HMC5883L" },
      { Attribute: "Mfr", MLX90393: "Melexis", HMC5883L: "Honeywell" },
      { Attribute: "Part Status", MLX90393: "Active", HMC5883L: "Obsolete" },
      { Attribute: "Interface", MLX90393: "I2C, SPI", HMC5883L: "-" },
      { Attribute: "Axis", MLX90393: "-", HMC5883L: "X, Y, Z" }
    ]);
  });

  it("suffixes repeated part numbers", () => {
    const table = buildComparisonTable([
      { "Part Number": "LM358", "Mfr": "TI" },
      { "Part Number": "LM358", "Mfr": "onsemi" },
      { "Part Number": "LM358", "Mfr": "ST" }
    ]);

    expect(table.columns).toEqual(["Attribute", "LM358", "LM358 (2)", "LM358 (3)"]);
    expect(table.rows[1]).toEqual({
      "Attribute": "Mfr",
      "LM358": "TI",
      "LM358 (2)": "onsemi",
      "LM358 (3)": "ST"
    });
  });

  it("keeps every column when a suffixed name is already a part number", () => {
    const table = buildComparisonTable([
      { "Part Number": "LM358", "Mfr": "TI" },
      { "Part Number": "LM358", "Mfr": "onsemi" },
      { "Part Number": "LM358 (2)", "Mfr": "ST" }
    ]);

    expect(table.columns).toEqual(["Attribute", "LM358", "LM358 (2)", "LM358 (2) (2)"]);
    expect(table.rows[1]).toEqual({
      "Attribute": "Mfr",
      "LM358": "TI",
      "LM358 (2)": "onsemi",
      "LM358 (2) (2)": "ST"
    });
  });

  it("never reuses the attribute column name", () => {
    const table = buildComparisonTable([{ "Part Number": "Attribute", "Mfr": "Acme" }]);

    expect(table.columns).toEqual(["Attribute", "Attribute (2)"]);
    expect(table.rows).toEqual([
      { "Attribute": "Part Number", "Attribute (2)": "Attribute" },
      { "Attribute": "Mfr", "Attribute (2)": "Acme" }
    ]);
  });

  it("names columns by position when a record has no part number", () => {
    const table = buildComparisonTable([{ "Mfr": "Bosch" }]);
    expect(table.columns).toEqual(["Attribute", "Component 1"]);
  });

  it("returns an empty table for no records", () => {
    expect(buildComparisonTable([])).toEqual({ columns: [], rows: [] });
  });
});
