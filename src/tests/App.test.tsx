import { fireEvent, render, screen } from "@testing-library/react";
import * as XLSX from "xlsx";
import App from "../App";

const buildPlanFile = (firmRows: number): File => {
  const rows: unknown[][] = [["Name", "Status", "22/01/2024", "23/01/2024"]];
  for (let index = 1; index <= firmRows; index += 1) {
    rows.push([`Item ${index}`, "Firm", index, 1]);
  }
  rows.push(["Done 1", "Actual", 9, 9], ["Done 2", "Actual", 9, 9]);

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), "Plan");
  const buffer = XLSX.write(workbook, { type: "array", bookType: "xlsx" }) as ArrayBuffer;

  // jsdom's Blob has no arrayBuffer().
  const file = new File([buffer], "plan.xlsx");
  Object.defineProperty(file, "arrayBuffer", { value: () => Promise.resolve(buffer) });
  return file;
};

describe("App", () => {
  it("renders the upload form with Process disabled until a file is chosen", () => {
    render(<App />);
    expect(screen.getByText("Convert Header to YYYYWW")).toBeInTheDocument();
    expect(screen.getByLabelText(/Sheet name/)).toHaveValue("");
    expect(screen.getByLabelText(/Header row/)).toHaveValue(0);
    expect(screen.getByRole("button", { name: "Process" })).toBeDisabled();
  });

  it("shows a single error for unsupported files and no download", async () => {
    render(<App />);
    const file = new File(["Name,Status"], "plan.csv", { type: "text/csv" });

    fireEvent.change(screen.getByLabelText("Excel file"), { target: { files: [file] } });
    fireEvent.click(screen.getByRole("button", { name: "Process" }));

    expect(await screen.findByRole("alert")).toHaveTextContent(
      "Error: Unsupported file format: .csv"
    );
    expect(screen.queryByRole("button", { name: "Download output" })).not.toBeInTheDocument();
  });

  it("previews the first 50 converted rows and offers the download", async () => {
    render(<App />);

    fireEvent.change(screen.getByLabelText("Excel file"), {
      target: { files: [buildPlanFile(60)] }
    });
    fireEvent.click(screen.getByRole("button", { name: "Process" }));

    expect(await screen.findByText("Processed successfully.")).toBeInTheDocument();
    expect(screen.queryByRole("alert")).not.toBeInTheDocument();
    expect(screen.getByText("Plan")).toBeInTheDocument();
    expect(screen.getByText("60 / 62")).toBeInTheDocument();
    expect(screen.getByText("1 (from 2)")).toBeInTheDocument();
    expect(screen.getByText("Preview (first 50 rows)")).toBeInTheDocument();
    expect(screen.getByText("60 rows total")).toBeInTheDocument();
    expect(screen.getByRole("columnheader", { name: "202404" })).toBeInTheDocument();
    // Header row plus 50 data rows.
    expect(screen.getAllByRole("row")).toHaveLength(51);
    expect(screen.getByRole("cell", { name: "Item 50" })).toBeInTheDocument();
    expect(screen.queryByRole("cell", { name: "Item 51" })).not.toBeInTheDocument();
    expect(screen.getByRole("button", { name: "Download output" })).toBeVisible();
  });
});
