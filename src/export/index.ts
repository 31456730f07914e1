export { CSV_FILE_NAME, escapeCsvField, exportCsv, renderCsv } from "./csvExporter";
export {
  ARTICLES_SHEET,
  SPREADSHEET_FILE_NAME,
  STATISTICS_SHEET,
  buildWorkbook,
  exportSpreadsheet,
} from "./spreadsheetExporter";
