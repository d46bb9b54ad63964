import { toText } from "../import/cells";
import type { RawTable } from "../import/types";

export const STATUS_COLUMN_INDEX = 1;

export const ALLOWED_STATUSES: ReadonlySet<string> = new Set(["firm", "forecast"]);

export const filterStatusRows = (table: RawTable): RawTable => {
  if (table.headers.length <= STATUS_COLUMN_INDEX) {
    return table;
  }
  const rows = table.rows.filter((row) =>
    ALLOWED_STATUSES.has(toText(row[STATUS_COLUMN_INDEX]).trim().toLowerCase())
  );
  return { ...table, rows };
};
