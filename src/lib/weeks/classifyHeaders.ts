import { toText } from "../import/cells";
import { parseHeaderDate, toWeekKey } from "./parseHeaderDate";

export type HeaderClassification = {
  labels: string[];
  weekMask: boolean[];
};

const weekKeyPattern = /^\d{6}$/;

export const isWeekKey = (label: string): boolean => weekKeyPattern.test(label);

export const classifyHeader = (header: unknown): { label: string; isWeek: boolean } => {
  const text = toText(header);
  if (isWeekKey(text)) {
    return { label: text, isWeek: true };
  }
  const date = parseHeaderDate(text);
  if (!date) {
    return { label: text, isWeek: false };
  }
  return { label: toWeekKey(date), isWeek: true };
};

export const classifyHeaders = (headers: readonly unknown[]): HeaderClassification => {
  const labels: string[] = [];
  const weekMask: boolean[] = [];
  headers.forEach((header) => {
    const { label, isWeek } = classifyHeader(header);
    labels.push(label);
    weekMask.push(isWeek);
  });
  return { labels, weekMask };
};
