export type CellValue = string | number | null;

export type RawTable = {
  sheetName?: string;
  headers: string[];
  rows: CellValue[][];
};

export type ReadOptions = {
  fileName: string;
  sheetName: string;
  headerRow: number;
};

export type WorkbookFormat = "xlsx" | "xlsm" | "xls" | "xlsb";
