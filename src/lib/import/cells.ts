import { format } from "date-fns";
import type { CellValue } from "./types";

const numericPattern = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

const isMidnight = (value: Date): boolean =>
  value.getHours() === 0 &&
  value.getMinutes() === 0 &&
  value.getSeconds() === 0 &&
  value.getMilliseconds() === 0;

const formatDate = (value: Date): string =>
  Number.isNaN(value.valueOf()) ? "" : format(value, "yyyy-MM-dd");

// Data cells keep their time of day; header labels are dates only.
const formatDateTime = (value: Date): string =>
  Number.isNaN(value.valueOf()) || isMidnight(value)
    ? formatDate(value)
    : format(value, "yyyy-MM-dd HH:mm:ss");

export const toCellValue = (value: unknown): CellValue => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isNaN(value) ? null : value;
  }
  if (typeof value === "string") {
    return value === "" ? null : value;
  }
  if (value instanceof Date) {
    const text = formatDateTime(value);
    return text === "" ? null : text;
  }
  if (typeof value === "boolean") {
    return value ? "TRUE" : "FALSE";
  }
  return String(value);
};

export const toText = (value: unknown): string => {
  if (value === null || value === undefined) {
    return "";
  }
  if (value instanceof Date) {
    return formatDate(value);
  }
  if (typeof value === "boolean") {
    return value ? "TRUE" : "FALSE";
  }
  return String(value);
};

/**
 * Numeric view of a cell. Text that is not a plain decimal literal, empty text
 * and non-finite numbers all come back as `null`.
 */
export const toNumeric = (value: CellValue): number | null => {
  if (value === null) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (!numericPattern.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
};
