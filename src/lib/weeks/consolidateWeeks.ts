import { toNumeric } from "../import/cells";
import type { CellValue, RawTable } from "../import/types";
import { isWeekKey } from "./classifyHeaders";

export type ConsolidateOptions = {
  sortWeekColumns?: boolean;
};

type OutputColumn = {
  label: string;
  values: CellValue[];
};

/** Week key → column indices, in first-seen key order. */
export const groupWeekColumns = (
  headers: readonly string[],
  weekMask: readonly boolean[]
): Map<string, number[]> => {
  const groups = new Map<string, number[]>();
  headers.forEach((header, index) => {
    if (!weekMask[index]) {
      return;
    }
    const members = groups.get(header);
    if (members) {
      members.push(index);
    } else {
      groups.set(header, [index]);
    }
  });
  return groups;
};

const columnValues = (table: RawTable, columnIndex: number): CellValue[] =>
  table.rows.map((row) => row[columnIndex] ?? null);

const mergeGroup = (table: RawTable, members: number[]): CellValue[] => {
  const numeric = members.map((index) => columnValues(table, index).map(toNumeric));
  const hasNumbers = numeric.some((values) => values.some((value) => value !== null));
  if (!hasNumbers) {
    // Placeholder columns (all blank or all text) survive as-is.
    return columnValues(table, members[0]);
  }

  return table.rows.map((_, rowIndex) => {
    const present = numeric
      .map((values) => values[rowIndex])
      .filter((value): value is number => value !== null);
    return present.length === 0 ? null : present.reduce((total, value) => total + value, 0);
  });
};

const compareWeekLabels = (a: string, b: string): number => {
  const aIsKey = isWeekKey(a);
  const bIsKey = isWeekKey(b);
  if (aIsKey && bIsKey) {
    return Number(a) - Number(b);
  }
  if (aIsKey !== bIsKey) {
    return aIsKey ? -1 : 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
};

export const consolidateWeeks = (
  table: RawTable,
  weekMask: readonly boolean[],
  { sortWeekColumns = true }: ConsolidateOptions = {}
): RawTable => {
  if (!weekMask.some(Boolean)) {
    return table;
  }

  const nonWeek: OutputColumn[] = [];
  table.headers.forEach((label, index) => {
    if (!weekMask[index]) {
      nonWeek.push({ label, values: columnValues(table, index) });
    }
  });

  const weeks: OutputColumn[] = Array.from(
    groupWeekColumns(table.headers, weekMask),
    ([label, members]) => ({ label, values: mergeGroup(table, members) })
  );
  if (sortWeekColumns) {
    weeks.sort((a, b) => compareWeekLabels(a.label, b.label));
  }

  const columns = [...nonWeek, ...weeks];
  return {
    ...table,
    headers: columns.map((column) => column.label),
    rows: table.rows.map((_, rowIndex) => columns.map((column) => column.values[rowIndex]))
  };
};
