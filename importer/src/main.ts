import { readFileSync } from "node:fs";
import { basename, extname } from "node:path";
import type { ImportedWorkbook } from "./ICommon.js";
import { readSpreadsheetXml } from "./SpreadsheetML/ReadXml.js";
import { WorkbookParseError } from "./WorkbookParseError.js";

/**
 * Read a SpreadsheetML 2003 (.xml) workbook from disk
 *
 * @param path - Path to the workbook file
 * @returns Sheets in file order, their non-blank cells, and workbook-level names
 * @throws WorkbookParseError if the file cannot be read or parsed
 *
 * @example
 * ```typescript
 * try {
 *   const workbook = readWorkbookFile('/data/report.xml');
 *   console.log('Sheets:', workbook.sheets.length);
 * } catch (error) {
 *   if (error instanceof WorkbookParseError) {
 *     console.error(`Failed to parse ${error.fileName}: ${error.message}`);
 *   }
 * }
 * ```
 */
export const readWorkbookFile = (path: string): ImportedWorkbook => {
    const fileName = basename(path) || "unknown";

    // Validate file extension
    const extension = extname(fileName).slice(1).toLowerCase();
    if (extension !== 'xml') {
        throw new WorkbookParseError(
            `Unsupported file format: .${extension}. Only SpreadsheetML .xml files are supported.`,
            fileName
        );
    }

    try {
        const xml = readFileSync(path, "utf8");
        return readSpreadsheetXml(xml, fileName);
    } catch (error) {
        // Re-throw WorkbookParseError as-is
        if (error instanceof WorkbookParseError) {
            throw error;
        }

        // Wrap other errors with context
        const message = error instanceof Error ? error.message : String(error);
        const cause = error instanceof Error ? error : undefined;

        throw new WorkbookParseError(
            `Failed to read workbook file: ${message}`,
            fileName,
            cause
        );
    }
};

export { WorkbookParseError } from "./WorkbookParseError.js";
export { readSpreadsheetXml } from "./SpreadsheetML/ReadXml.js";
export type {
    ImportedCell,
    ImportedCellValue,
    ImportedName,
    ImportedSheet,
    ImportedWorkbook,
} from "./ICommon.js";
