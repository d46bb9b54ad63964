import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { outputFileName, writeWorkbook } from "../lib/export/writeWorkbook";
import { toCellValue, toNumeric, toText } from "../lib/import/cells";
import { SourceReadError, UnsupportedFormatError } from "../lib/import/errors";
import { detectFormat, fileExtension, readWorkbook } from "../lib/import/readWorkbook";

const buildWorkbook = (sheets: Record<string, unknown[][]>): ArrayBuffer => {
  const workbook = XLSX.utils.book_new();
  Object.entries(sheets).forEach(([name, rows]) => {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  });
  return XLSX.write(workbook, { type: "array", bookType: "xlsx" }) as ArrayBuffer;
};

const twoSheets = () =>
  buildWorkbook({
    Summary: [["Total"], [42]],
    Plan: [
      ["Name", "Status", "202401"],
      ["A", "Firm", 5],
      ["B", "Forecast", null]
    ]
  });

describe("cell coercion", () => {
  it("converts to numbers only for plain decimal text", () => {
    expect(toNumeric(" 3 ")).toBe(3);
    expect(toNumeric("1e3")).toBe(1000);
    expect(toNumeric("-.5")).toBe(-0.5);
    expect(toNumeric(7)).toBe(7);
    expect(toNumeric("0x10")).toBeNull();
    expect(toNumeric("abc")).toBeNull();
    expect(toNumeric("")).toBeNull();
    expect(toNumeric(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toNumeric(null)).toBeNull();
  });

  it("normalises raw sheet values", () => {
    expect(toCellValue(undefined)).toBeNull();
    expect(toCellValue("")).toBeNull();
    expect(toCellValue(Number.NaN)).toBeNull();
    expect(toCellValue(true)).toBe("TRUE");
    expect(toCellValue(new Date(2024, 0, 22))).toBe("2024-01-22");
    expect(toText(12.5)).toBe("12.5");
    expect(toText(null)).toBe("");
  });

  it("keeps the time of day on date data cells", () => {
    expect(toCellValue(new Date(2024, 0, 22, 14, 30))).toBe("2024-01-22 14:30:00");
    expect(toCellValue(new Date(2024, 0, 22, 0, 0, 5))).toBe("2024-01-22 00:00:05");
    expect(toCellValue(new Date(Number.NaN))).toBeNull();
    expect(toText(new Date(2024, 0, 22, 14, 30))).toBe("2024-01-22");
  });
});

describe("format detection", () => {
  it("accepts the four workbook extensions in any case", () => {
    expect(detectFormat("plan.XLSX")).toBe("xlsx");
    expect(detectFormat("plan.v2.xlsm")).toBe("xlsm");
    expect(detectFormat("plan.xls")).toBe("xls");
    expect(detectFormat("plan.xlsb")).toBe("xlsb");
  });

  it("names the offending extension", () => {
    expect(() => detectFormat("plan.csv")).toThrow("Unsupported file format: .csv");
    expect(() => detectFormat("plan")).toThrow("Unsupported file format: (none)");
    expect(fileExtension(".hidden")).toBe("");
  });

  it("fails before parsing unsupported files", () => {
    const garbage = new Uint8Array([1, 2, 3]);
    expect(() =>
      readWorkbook(garbage, { fileName: "plan.csv", sheetName: "", headerRow: 0 })
    ).toThrow(UnsupportedFormatError);
  });
});

describe("readWorkbook", () => {
  it("reads the first sheet when no sheet name is given", () => {
    const table = readWorkbook(twoSheets(), { fileName: "plan.xlsx", sheetName: "", headerRow: 0 });

    expect(table.sheetName).toBe("Summary");
    expect(table.headers).toEqual(["Total"]);
    expect(table.rows).toEqual([[42]]);
  });

  it("reads a named sheet and pads missing cells", () => {
    const table = readWorkbook(twoSheets(), {
      fileName: "plan.xlsx",
      sheetName: " Plan ",
      headerRow: 0
    });

    expect(table.sheetName).toBe("Plan");
    expect(table.headers).toEqual(["Name", "Status", "202401"]);
    expect(table.rows).toEqual([
      ["A", "Firm", 5],
      ["B", "Forecast", null]
    ]);
  });

  it("skips the rows above the header row", () => {
    const buffer = buildWorkbook({
      Plan: [["Exported 2024"], [], ["Name", "Status"], ["A", "Firm"]]
    });

    const table = readWorkbook(buffer, { fileName: "plan.xlsx", sheetName: "", headerRow: 2 });

    expect(table.headers).toEqual(["Name", "Status"]);
    expect(table.rows).toEqual([["A", "Firm"]]);
  });

  it("surfaces unknown sheets as-is", () => {
    expect(() =>
      readWorkbook(twoSheets(), { fileName: "plan.xlsx", sheetName: "Missing", headerRow: 0 })
    ).toThrow('Worksheet "Missing" not found.');
  });

  it("rejects a header row past the end of the sheet", () => {
    expect(() =>
      readWorkbook(twoSheets(), { fileName: "plan.xlsx", sheetName: "Plan", headerRow: 10 })
    ).toThrow('Header row 10 is outside sheet "Plan" (3 rows).');
  });

  it("adds a re-save hint to .xlsb read failures", () => {
    let caught: unknown;
    try {
      readWorkbook(twoSheets(), { fileName: "plan.xlsb", sheetName: "Missing", headerRow: 0 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SourceReadError);
    if (caught instanceof SourceReadError) {
      expect(caught.message).toContain("save it as .xlsx");
      expect(caught.fileName).toBe("plan.xlsb");
      expect(caught.cause).toBeInstanceOf(Error);
    }
  });
});

describe("writeWorkbook", () => {
  it("writes a table that reads back unchanged", () => {
    const table = {
      headers: ["Name", "Status", "202401", "202404"],
      rows: [
        ["A", "Firm", 3, 3],
        ["C", "forecast", null, 5]
      ]
    };

    const buffer = writeWorkbook(table);
    const readBack = readWorkbook(buffer, { fileName: "out.xlsx", sheetName: "", headerRow: 0 });

    expect(readBack).toEqual({ sheetName: "Sheet1", ...table });
  });

  it("names the output after the local date", () => {
    expect(outputFileName(new Date(2026, 9, 19))).toBe("20261019.xlsx");
  });
});
