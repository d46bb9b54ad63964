import { randomUUID } from "crypto";
import { outputFileName, writeWorkbook, XLSX_MIME_TYPE } from "../src/lib/export/writeWorkbook";
import {
  errorMessage,
  InvalidOptionsError,
  UnsupportedFormatError
} from "../src/lib/import/errors";
import { detectFormat, readWorkbook } from "../src/lib/import/readWorkbook";
import type { RawTable } from "../src/lib/import/types";
import { parseProcessOptions, type ProcessOptions } from "../src/lib/weeks/options";
import { convertTable, type ConversionResult } from "../src/lib/weeks/pipeline";

export const config = {
  runtime: "nodejs"
};

export type ConvertRequest = AsyncIterable<Uint8Array | string> & {
  method?: string;
  url?: string;
};

export type ConvertResponse = {
  statusCode: number;
  setHeader(name: string, value: string): void;
  end(body: string | Uint8Array): void;
};

const MAX_BODY_BYTES = 50 * 1024 * 1024;

const jsonResponse = (res: ConvertResponse, statusCode: number, payload: Record<string, unknown>) => {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload));
};

const createRequestId = (): string => {
  try {
    return randomUUID();
  } catch {
    return `req-${Math.random().toString(36).slice(2, 10)}`;
  }
};

const readRequestBody = async (req: ConvertRequest): Promise<Buffer> => {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk);
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new Error(`Upload exceeds ${MAX_BODY_BYTES} bytes.`);
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks);
};

const logStart = (payload: {
  requestId: string;
  method: string | undefined;
  fileName: string | null;
}) => {
  console.info("[convert-weeks] start", payload);
};

const logSuccess = (requestId: string, rowsKept: number, columnsWritten: number) => {
  console.info("[convert-weeks] success", { requestId, rowsKept, columnsWritten });
};

const logFailure = (requestId: string, error: unknown, fallbackMessage: string) => {
  const payload =
    error instanceof Error
      ? { message: error.message, stack: error.stack }
      : { message: fallbackMessage, stack: undefined };
  console.error("[convert-weeks] fail", { requestId, ...payload });
};

const readFailureStatus = (error: unknown): number =>
  error instanceof UnsupportedFormatError ? 415 : 422;

export default async function handler(req: ConvertRequest, res: ConvertResponse) {
  const requestId = createRequestId();
  const query = new URL(req.url ?? "/", "http://localhost").searchParams;
  const fileName = query.get("fileName")?.trim() || null;
  logStart({ requestId, method: req.method, fileName });

  if (req.method !== "POST") {
    return jsonResponse(res, 405, { ok: false, error: "Method Not Allowed", requestId });
  }
  if (!fileName) {
    return jsonResponse(res, 400, { ok: false, error: "Missing fileName", requestId });
  }

  let options: ProcessOptions;
  try {
    options = parseProcessOptions({
      sheetName: query.get("sheet") ?? undefined,
      headerRow: query.get("headerRow") ?? undefined
    });
  } catch (error) {
    if (error instanceof InvalidOptionsError) {
      return jsonResponse(res, 400, { ok: false, error: error.message, requestId });
    }
    throw error;
  }

  try {
    detectFormat(fileName);
  } catch (error) {
    logFailure(requestId, error, "Unsupported format");
    return jsonResponse(res, readFailureStatus(error), {
      ok: false,
      error: errorMessage(error),
      requestId
    });
  }

  let body: Buffer;
  try {
    body = await readRequestBody(req);
  } catch (error) {
    logFailure(requestId, error, "Unreadable body");
    return jsonResponse(res, 400, { ok: false, error: "Invalid request", requestId });
  }
  if (body.length === 0) {
    return jsonResponse(res, 400, { ok: false, error: "Empty upload", requestId });
  }

  let source: RawTable;
  try {
    source = readWorkbook(body, { fileName, ...options });
  } catch (error) {
    logFailure(requestId, error, "Read failed");
    return jsonResponse(res, readFailureStatus(error), {
      ok: false,
      error: errorMessage(error),
      requestId
    });
  }

  let result: ConversionResult;
  let output: ArrayBuffer;
  try {
    result = convertTable(source);
    output = writeWorkbook(result.table);
  } catch (error) {
    logFailure(requestId, error, "Conversion failed");
    return jsonResponse(res, 500, { ok: false, error: "Conversion failed", requestId });
  }

  logSuccess(requestId, result.summary.rowsKept, result.summary.columnsWritten);
  res.statusCode = 200;
  res.setHeader("Content-Type", XLSX_MIME_TYPE);
  res.setHeader("Content-Disposition", `attachment; filename="${outputFileName()}"`);
  res.setHeader("X-Rows-Read", String(result.summary.rowsRead));
  res.setHeader("X-Rows-Kept", String(result.summary.rowsKept));
  res.end(new Uint8Array(output));
}
