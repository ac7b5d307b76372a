/**
 * Error class for workbook parsing errors
 */
export class WorkbookParseError extends Error {
    public readonly fileName: string;
    public readonly cause?: Error;

    constructor(message: string, fileName: string, cause?: Error) {
        super(message);
        this.name = 'WorkbookParseError';
        this.fileName = fileName;
        this.cause = cause;
    }
}
