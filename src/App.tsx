import { useMemo, useState, type ChangeEvent, type FormEvent } from "react";
import "./App.css";
import { PreviewTable } from "./components/convert/PreviewTable";
import { outputFileName, writeWorkbook, XLSX_MIME_TYPE } from "./lib/export/writeWorkbook";
import { errorMessage } from "./lib/import/errors";
import { parseFile } from "./lib/import/parseFile";
import { SUPPORTED_FORMATS } from "./lib/import/readWorkbook";
import { isWeekKey } from "./lib/weeks/classifyHeaders";
import { MAX_HEADER_ROW, parseProcessOptions } from "./lib/weeks/options";
import { convertTable, type ConversionResult } from "./lib/weeks/pipeline";

const PREVIEW_ROWS = 50;

const acceptedExtensions = SUPPORTED_FORMATS.map((format) => `.${format}`).join(",");

const downloadBuffer = (buffer: ArrayBuffer, fileName: string) => {
  const url = URL.createObjectURL(new Blob([buffer], { type: XLSX_MIME_TYPE }));
  const anchor = document.createElement("a");
  anchor.href = url;
  anchor.download = fileName;
  anchor.click();
  URL.revokeObjectURL(url);
};

function App() {
  const [file, setFile] = useState<File | null>(null);
  const [sheetName, setSheetName] = useState("");
  const [headerRow, setHeaderRow] = useState("0");
  const [isProcessing, setIsProcessing] = useState(false);
  const [result, setResult] = useState<ConversionResult | null>(null);
  const [error, setError] = useState<string | null>(null);

  const weekColumns = useMemo(
    () =>
      result
        ? result.table.headers.flatMap((header, index) => (isWeekKey(header) ? [index] : []))
        : [],
    [result]
  );

  const handleFileChange = (event: ChangeEvent<HTMLInputElement>) => {
    setFile(event.target.files?.[0] ?? null);
    setResult(null);
    setError(null);
  };

  const handleProcess = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    if (!file) {
      return;
    }
    setIsProcessing(true);
    setResult(null);
    setError(null);
    try {
      const options = parseProcessOptions({ sheetName, headerRow });
      const table = await parseFile(file, options);
      setResult(convertTable(table));
    } catch (processError) {
      setError(errorMessage(processError));
    } finally {
      setIsProcessing(false);
    }
  };

  const handleDownload = () => {
    if (!result) {
      return;
    }
    try {
      downloadBuffer(writeWorkbook(result.table), outputFileName());
    } catch (downloadError) {
      setError(errorMessage(downloadError));
    }
  };

  return (
    <div className="app-shell">
      <header className="app-header">
        <h1>Convert Header to YYYYWW</h1>
        <p className="muted">
          Keeps Firm and Forecast rows, renames date headers to ISO weeks and merges duplicate
          weeks.
        </p>
      </header>

      <form className="panel upload-panel" onSubmit={handleProcess}>
        <label className="field">
          <span>Excel file</span>
          <input type="file" accept={acceptedExtensions} onChange={handleFileChange} />
        </label>
        <label className="field">
          <span>Sheet name (blank = first sheet)</span>
          <input
            type="text"
            value={sheetName}
            onChange={(event) => setSheetName(event.target.value)}
          />
        </label>
        <label className="field">
          <span>Header row (0-based)</span>
          <input
            type="number"
            min={0}
            max={MAX_HEADER_ROW}
            step={1}
            value={headerRow}
            onChange={(event) => setHeaderRow(event.target.value)}
          />
        </label>
        <button type="submit" className="primary" disabled={!file || isProcessing}>
          {isProcessing ? "Processing…" : "Process"}
        </button>
      </form>

      {error && (
        <div role="alert" className="callout error-callout">
          Error: {error}
        </div>
      )}

      {result && (
        <section className="panel result-panel">
          <div className="callout success-callout">Processed successfully.</div>
          <div className="summary-grid">
            <p>
              <span className="muted">Sheet</span>{" "}
              <span className="strong">{result.summary.sheetName}</span>
            </p>
            <p>
              <span className="muted">Rows kept</span>{" "}
              <span className="strong">
                {result.summary.rowsKept} / {result.summary.rowsRead}
              </span>
            </p>
            <p>
              <span className="muted">Week columns</span>{" "}
              <span className="strong">
                {result.summary.weekColumnsWritten} (from {result.summary.weekColumnsRead})
              </span>
            </p>
          </div>
          <PreviewTable table={result.table} weekColumns={weekColumns} maxRows={PREVIEW_ROWS} />
          <button type="button" className="primary" onClick={handleDownload}>
            Download output
          </button>
        </section>
      )}
    </div>
  );
}

export default App;
