import { format } from "date-fns";
import * as XLSX from "xlsx";
import type { RawTable } from "../import/types";

export const XLSX_MIME_TYPE =
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export const OUTPUT_SHEET_NAME = "Sheet1";

export const outputFileName = (date: Date = new Date()): string =>
  `${format(date, "yyyyMMdd")}.xlsx`;

export const writeWorkbook = (table: RawTable): ArrayBuffer => {
  const sheet = XLSX.utils.aoa_to_sheet([table.headers, ...table.rows]);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, OUTPUT_SHEET_NAME);
  const output: unknown = XLSX.write(workbook, { type: "array", bookType: "xlsx" });
  if (!(output instanceof ArrayBuffer)) {
    throw new Error("Workbook serialization did not produce an ArrayBuffer.");
  }
  return output;
};
