/**
 * Shared shapes of a workbook read from disk.
 *
 * Coordinates are 1-based, the way the file stores them.
 */

export type ImportedCellValue = string | number | boolean | Date | null;

export interface ImportedCell {
    row: number;
    column: number;
    value: ImportedCellValue;
    /** Formula text as written in the file, e.g. "=R1C1+1" */
    formula?: string;
}

export interface ImportedSheet {
    name: string;
    cells: ImportedCell[];
}

export interface ImportedName {
    name: string;
    sheetName: string;
    topLeft: { row: number; column: number };
    bottomRight: { row: number; column: number };
}

export interface ImportedWorkbook {
    sheets: ImportedSheet[];
    names: ImportedName[];
}

/** Output of fast-xml-parser with attributes kept under "@_" keys. */
export type XmlNode = Record<string, unknown>;

export function isXmlNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Child elements of a node as a list; elements the parser collapsed to
 * plain text (an empty tag becomes "") are returned as empty nodes.
 */
export function childNodes(value: unknown): XmlNode[] {
    if (value === undefined) {
        return [];
    }
    const list = Array.isArray(value) ? value : [value];
    return list.map(item => (isXmlNode(item) ? item : {}));
}

export function attribute(node: XmlNode, name: string): string | undefined {
    const value = node[`@_${name}`];
    return value === undefined ? undefined : String(value);
}

/** Text content of an element, whether the parser kept it as a node or a scalar. */
export function textContent(value: unknown): string {
    if (value === undefined || value === null) {
        return '';
    }
    if (isXmlNode(value)) {
        const text = value['#text'];
        return text === undefined ? '' : String(text);
    }
    return String(value);
}
