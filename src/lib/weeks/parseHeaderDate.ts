import { getISOWeek, getISOWeekYear, isValid, parse } from "date-fns";

// Two-digit years resolve into 1950-2049.
const REFERENCE_DATE = new Date(2000, 0, 1);

const MIN_YEAR = 1000;
const MAX_YEAR = 9999;

const TIME_SUFFIXES = ["", " HH:mm:ss", " HH:mm", "'T'HH:mm:ss"];
const SEPARATORS = ["/", "-", "."];

const withTimes = (patterns: string[]): string[] =>
  patterns.flatMap((pattern) => TIME_SUFFIXES.map((suffix) => `${pattern}${suffix}`));

const yearFirst = withTimes(SEPARATORS.map((sep) => `yyyy${sep}M${sep}d`));

const dayFirst = withTimes([
  ...SEPARATORS.map((sep) => `d${sep}M${sep}yyyy`),
  ...SEPARATORS.map((sep) => `d${sep}M${sep}yy`)
]);

const monthFirst = withTimes([
  ...SEPARATORS.map((sep) => `M${sep}d${sep}yyyy`),
  ...SEPARATORS.map((sep) => `M${sep}d${sep}yy`)
]);

const monthNames = [
  "d MMM yyyy",
  "d MMMM yyyy",
  "d-MMM-yyyy",
  "d-MMM-yy",
  "MMM d, yyyy",
  "MMMM d, yyyy",
  "MMM d yyyy",
  "MMMM d yyyy"
];

// Month-only headers stand for the first of the month.
const monthOnly = ["MMM yyyy", "MMMM yyyy", "M/yyyy", "M-yyyy", "M.yyyy", "yyyy-M"];

// Order matters: day-first wins whenever both readings are valid.
export const HEADER_DATE_PATTERNS: readonly string[] = [
  ...yearFirst,
  ...dayFirst,
  ...monthFirst,
  ...monthNames,
  ...monthOnly
];

export const parseHeaderDate = (text: string): Date | null => {
  const trimmed = text.trim();
  if (!trimmed) {
    return null;
  }
  for (const pattern of HEADER_DATE_PATTERNS) {
    const parsed = parse(trimmed, pattern, REFERENCE_DATE);
    if (!isValid(parsed)) {
      continue;
    }
    const year = parsed.getFullYear();
    if (year >= MIN_YEAR && year <= MAX_YEAR) {
      return parsed;
    }
  }
  return null;
};

export const toWeekKey = (date: Date): string =>
  `${getISOWeekYear(date)}${String(getISOWeek(date)).padStart(2, "0")}`;
