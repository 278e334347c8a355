/**
 * Base class for errors raised by this library. HTTP failures use `HttpError`
 * from the HTTP client instead.
 */
export class PaperSearchError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A caller passed a value outside an operation's accepted range.
 */
export class InvalidArgumentError extends PaperSearchError {
    constructor(
        public readonly argument: string,
        message: string
    ) {
        super(`Invalid ${argument}: ${message}`);
    }
}

/**
 * The source cannot perform the requested operation at all
 * (e.g. PDF download from a discovery-only metasearch backend).
 */
export class UnsupportedCapabilityError extends PaperSearchError {
    constructor(
        public readonly source: string,
        public readonly capability: string,
        hint: string
    ) {
        super(`${source} does not support ${capability}. ${hint}`);
    }
}

/**
 * The source supports downloads, but has no open-access PDF for this paper.
 */
export class PdfNotAvailableError extends PaperSearchError {
    constructor(
        public readonly source: string,
        public readonly paperId: string
    ) {
        super(`No open-access PDF available from ${source} for paper ${paperId}`);
    }
}

export class DocumentNotFoundError extends PaperSearchError {
    constructor(public readonly path: string) {
        super(`PDF file not found: ${path}`);
    }
}

/**
 * A knowledge store operation referenced a record that does not exist.
 */
export class RecordNotFoundError extends PaperSearchError {
    constructor(
        public readonly table: string,
        public readonly recordId: number | string
    ) {
        super(`No ${table} record with id ${recordId}`);
    }
}
