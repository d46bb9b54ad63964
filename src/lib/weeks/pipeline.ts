import { readWorkbook } from "../import/readWorkbook";
import type { RawTable, ReadOptions } from "../import/types";
import { classifyHeaders } from "./classifyHeaders";
import { consolidateWeeks, type ConsolidateOptions } from "./consolidateWeeks";
import { filterStatusRows } from "./filterRows";

export type ProcessSummary = {
  sheetName?: string;
  rowsRead: number;
  rowsKept: number;
  columnsRead: number;
  weekColumnsRead: number;
  weekColumnsWritten: number;
  columnsWritten: number;
};

export type ConversionResult = {
  table: RawTable;
  summary: ProcessSummary;
};

export const convertTable = (
  source: RawTable,
  options: ConsolidateOptions = {}
): ConversionResult => {
  const filtered = filterStatusRows(source);
  const { labels, weekMask } = classifyHeaders(filtered.headers);
  const relabeled: RawTable = { ...filtered, headers: labels };
  const table = consolidateWeeks(relabeled, weekMask, options);

  const weekColumnsRead = weekMask.filter(Boolean).length;
  const nonWeekColumns = weekMask.length - weekColumnsRead;
  return {
    table,
    summary: {
      sheetName: source.sheetName,
      rowsRead: source.rows.length,
      rowsKept: table.rows.length,
      columnsRead: source.headers.length,
      weekColumnsRead,
      weekColumnsWritten: table.headers.length - nonWeekColumns,
      columnsWritten: table.headers.length
    }
  };
};

export const convertWorkbook = (
  data: ArrayBuffer | Uint8Array,
  options: ReadOptions & ConsolidateOptions
): ConversionResult => {
  const { sortWeekColumns, ...readOptions } = options;
  return convertTable(readWorkbook(data, readOptions), { sortWeekColumns });
};
