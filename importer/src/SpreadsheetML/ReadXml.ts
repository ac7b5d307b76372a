import { XMLParser, XMLValidator } from "fast-xml-parser";
import {
    ImportedCell,
    ImportedCellValue,
    ImportedName,
    ImportedSheet,
    ImportedWorkbook,
    XmlNode,
    attribute,
    childNodes,
    isXmlNode,
    textContent,
} from "../ICommon.js";
import { WorkbookParseError } from "../WorkbookParseError.js";

const ARRAY_TAGS = new Set(["Worksheet", "Row", "Cell", "NamedRange"]);

// XML Parser configuration. Namespace prefixes are dropped so "ss:Name"
// and "Name" read the same.
const parserOptions = {
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    textNodeName: "#text",
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    isArray: (name: string, _jpath: string, _isLeafNode: boolean, isAttribute: boolean) => {
        return !isAttribute && ARRAY_TAGS.has(name);
    }
};

const xmlParser = new XMLParser(parserOptions);

const R1C1_REFERENCE = /^=?(?:'((?:[^']|'')+)'|([^'!]+))!R(\d+)C(\d+)(?::R(\d+)C(\d+))?$/;

/**
 * Parse a SpreadsheetML 2003 document (the single-file XML workbook format).
 *
 * @param xml - Document text
 * @param fileName - Used in error messages only
 * @throws WorkbookParseError when the text is not a SpreadsheetML workbook
 */
export function readSpreadsheetXml(xml: string, fileName: string): ImportedWorkbook {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        throw new WorkbookParseError(
            `Invalid XML: ${validation.err.msg} (line ${validation.err.line})`,
            fileName
        );
    }

    const document: unknown = xmlParser.parse(xml);
    const root = isXmlNode(document) ? document["Workbook"] : undefined;
    if (root === undefined) {
        throw new WorkbookParseError("Missing <Workbook> root element", fileName);
    }
    // An element without children comes back as ""
    const workbook: XmlNode = isXmlNode(root) ? root : {};

    const sheets = childNodes(workbook["Worksheet"]).map((node, i) =>
        readWorksheet(node, i, fileName)
    );
    if (sheets.length === 0) {
        throw new WorkbookParseError("Workbook has no worksheets", fileName);
    }

    const names = isXmlNode(workbook["Names"])
        ? readNames(workbook["Names"], fileName)
        : [];

    return { sheets, names };
}

function readWorksheet(node: XmlNode, position: number, fileName: string): ImportedSheet {
    const name = attribute(node, "Name");
    if (!name) {
        throw new WorkbookParseError(`Worksheet ${position + 1} has no name`, fileName);
    }

    const cells: ImportedCell[] = [];
    const table = node["Table"];
    if (!isXmlNode(table)) {
        return { name, cells };
    }

    // Rows and cells carry an explicit ss:Index only after a gap
    let row = 0;
    for (const rowNode of childNodes(table["Row"])) {
        row = readIndex(rowNode, row + 1, fileName);
        let column = 0;
        for (const cellNode of childNodes(rowNode["Cell"])) {
            column = readIndex(cellNode, column + 1, fileName);
            const cell = readCell(cellNode, row, column, fileName);
            if (cell) {
                cells.push(cell);
            }
            column += readInteger(cellNode, "MergeAcross", 0, fileName);
        }
    }

    return { name, cells };
}

function readCell(
    node: XmlNode,
    row: number,
    column: number,
    fileName: string
): ImportedCell | null {
    const formula = attribute(node, "Formula");
    const data = node["Data"];
    const value = data === undefined ? null : readData(data, row, column, fileName);

    if (value === null && !formula) {
        return null;
    }
    return formula ? { row, column, value, formula } : { row, column, value };
}

function readData(
    data: unknown,
    row: number,
    column: number,
    fileName: string
): ImportedCellValue {
    const type = isXmlNode(data) ? attribute(data, "Type") ?? "String" : "String";
    const text = textContent(data);

    switch (type) {
        case "Number": {
            const value = Number(text);
            if (text === "" || Number.isNaN(value)) {
                throw new WorkbookParseError(`Bad number '${text}' at R${row}C${column}`, fileName);
            }
            return value;
        }
        case "Boolean":
            return text === "1" || text.toLowerCase() === "true";
        case "DateTime": {
            const value = new Date(text);
            if (Number.isNaN(value.getTime())) {
                throw new WorkbookParseError(`Bad date '${text}' at R${row}C${column}`, fileName);
            }
            return value;
        }
        case "String":
        case "Error":
            return text;
        default:
            throw new WorkbookParseError(`Unknown data type '${type}' at R${row}C${column}`, fileName);
    }
}

function readIndex(node: XmlNode, fallback: number, fileName: string): number {
    const index = readInteger(node, "Index", fallback, fileName);
    if (index < fallback) {
        throw new WorkbookParseError(`ss:Index ${index} goes backwards`, fileName);
    }
    return index;
}

function readInteger(node: XmlNode, name: string, fallback: number, fileName: string): number {
    const raw = attribute(node, name);
    if (raw === undefined) {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
        throw new WorkbookParseError(`Bad ss:${name} '${raw}'`, fileName);
    }
    return value;
}

/**
 * Workbook-level names. Names that refer to a constant or a formula
 * rather than a cell block are not ranges and are left out.
 */
function readNames(names: XmlNode, fileName: string): ImportedName[] {
    const result: ImportedName[] = [];
    for (const node of childNodes(names["NamedRange"])) {
        const name = attribute(node, "Name");
        const refersTo = attribute(node, "RefersTo");
        if (!name || !refersTo) {
            throw new WorkbookParseError("NamedRange needs ss:Name and ss:RefersTo", fileName);
        }
        const match = R1C1_REFERENCE.exec(refersTo);
        if (!match) {
            continue;
        }
        const sheetName = match[1] !== undefined ? match[1].replace(/''/g, "'") : match[2];
        const top = { row: Number(match[3]), column: Number(match[4]) };
        const bottom = match[5] !== undefined
            ? { row: Number(match[5]), column: Number(match[6]) }
            : top;
        result.push({ name, sheetName, topLeft: top, bottomRight: bottom });
    }
    return result;
}
