import * as XLSX from "xlsx";
import { toCellValue, toText } from "./cells";
import { SourceReadError, UnsupportedFormatError } from "./errors";
import type { CellValue, RawTable, ReadOptions, WorkbookFormat } from "./types";

export const SUPPORTED_FORMATS: readonly WorkbookFormat[] = ["xlsx", "xlsm", "xls", "xlsb"];

export const fileExtension = (name: string): string => {
  const dot = name.lastIndexOf(".");
  return dot <= 0 ? "" : name.slice(dot + 1).toLowerCase();
};

const isSupportedFormat = (extension: string): extension is WorkbookFormat =>
  SUPPORTED_FORMATS.some((format) => format === extension);

export const detectFormat = (fileName: string): WorkbookFormat => {
  const extension = fileExtension(fileName);
  if (!isSupportedFormat(extension)) {
    throw new UnsupportedFormatError(extension);
  }
  return extension;
};

const loadWorkbook = (data: ArrayBuffer | Uint8Array): XLSX.WorkBook =>
  XLSX.read(data instanceof Uint8Array ? data : new Uint8Array(data), {
    type: "array",
    cellDates: true
  });

const buildTable = (sheetName: string, rows: unknown[][], headerRow: number): RawTable => {
  if (headerRow >= rows.length) {
    throw new Error(
      `Header row ${headerRow} is outside sheet "${sheetName}" (${rows.length} rows).`
    );
  }
  const headers = rows[headerRow].map(toText);
  const dataRows = rows.slice(headerRow + 1).map((row): CellValue[] =>
    headers.map((_, index) => toCellValue(row[index]))
  );
  return { sheetName, headers, rows: dataRows };
};

const readSheet = (
  data: ArrayBuffer | Uint8Array,
  { sheetName, headerRow }: Pick<ReadOptions, "sheetName" | "headerRow">
): RawTable => {
  const workbook = loadWorkbook(data);
  const target = sheetName.trim() || workbook.SheetNames[0];
  if (!target) {
    throw new Error("Workbook has no sheets.");
  }
  const sheet = workbook.Sheets[target];
  if (!sheet) {
    throw new Error(`Worksheet "${target}" not found.`);
  }
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    blankrows: true,
    defval: null
  });
  return buildTable(target, rows, headerRow);
};

/**
 * Reads one sheet into a table. The format check happens before any byte is
 * parsed; `.xlsb` read failures are rewrapped with a hint to re-save the file,
 * other read failures propagate untouched.
 */
export const readWorkbook = (data: ArrayBuffer | Uint8Array, options: ReadOptions): RawTable => {
  const format = detectFormat(options.fileName);
  try {
    return readSheet(data, options);
  } catch (error) {
    if (format === "xlsb") {
      throw new SourceReadError(
        "Could not read the .xlsb file. Open it in Excel, save it as .xlsx and upload it again.",
        options.fileName,
        { cause: error }
      );
    }
    throw error;
  }
};
