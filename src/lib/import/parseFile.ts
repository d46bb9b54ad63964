import { detectFormat, readWorkbook } from "./readWorkbook";
import type { RawTable } from "./types";

export const parseFile = async (
  file: File,
  { sheetName, headerRow }: { sheetName: string; headerRow: number }
): Promise<RawTable> => {
  detectFormat(file.name);
  const buffer = await file.arrayBuffer();
  return readWorkbook(buffer, { fileName: file.name, sheetName, headerRow });
};
