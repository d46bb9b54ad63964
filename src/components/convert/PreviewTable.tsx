import type { CellValue, RawTable } from "../../lib/import/types";

type PreviewTableProps = {
  table: RawTable;
  weekColumns: number[];
  maxRows?: number;
};

const formatCell = (cell: CellValue): string => {
  if (cell === null) {
    return "";
  }
  if (typeof cell === "number") {
    return Number.isNaN(cell) ? "" : cell.toString();
  }
  return cell;
};

export const PreviewTable = ({ table, weekColumns, maxRows = 50 }: PreviewTableProps) => {
  const rows = table.rows.slice(0, maxRows);

  return (
    <div className="preview">
      <div className="preview-header">
        <p className="muted">Preview (first {rows.length} rows)</p>
        <span className="pill muted-pill">{table.rows.length} rows total</span>
      </div>
      <table>
        <thead>
          <tr>
            <th className="row-index">#</th>
            {table.headers.map((header, index) => (
              <th
                key={`${header}-${index}`}
                className={weekColumns.includes(index) ? "week" : ""}
              >
                {header}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((row, rowIndex) => (
            <tr key={`row-${rowIndex}`}>
              <td className="row-index">{rowIndex + 1}</td>
              {table.headers.map((_, columnIndex) => (
                <td
                  key={`cell-${rowIndex}-${columnIndex}`}
                  className={weekColumns.includes(columnIndex) ? "week" : ""}
                >
                  {formatCell(row[columnIndex] ?? null)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
};
