/**
 * Base class for every error raised by the callout pipeline
 */
export class CalloutError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A reference table could not be read or lacks required columns.
 * Fatal to that directory's load; the message is meant for the operator.
 */
export class DataSourceError extends CalloutError {
    readonly source: string;
    readonly missingColumns: string[];
    readonly foundColumns: string[];

    constructor(
        source: string,
        message: string,
        details: { missingColumns?: string[]; foundColumns?: string[]; cause?: unknown } = {}
    ) {
        const missingColumns = details.missingColumns ?? [];
        const foundColumns = details.foundColumns ?? [];
        let full = `${source}: ${message}`;
        if (missingColumns.length > 0) {
            full += `\nMissing columns: ${missingColumns.join(', ')}`;
            full += `\nFound columns: ${foundColumns.join(', ')}`;
        }
        super(full, { cause: details.cause });
        this.source = source;
        this.missingColumns = missingColumns;
        this.foundColumns = foundColumns;
    }
}

/**
 * Resolution could not proceed: unknown incident for the district, or an
 * alarm-system incident at an address without a usable alarm site.
 */
export class NotFoundError extends CalloutError {}

/**
 * Caller-supplied address or incident input is incomplete
 */
export class ValidationError extends CalloutError {}

export class DispatchError extends CalloutError {
    readonly status: number | null;

    constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
        super(message, options);
        this.status = status;
    }
}

/**
 * Credentials or tokens were rejected by the dispatch service
 */
export class DispatchAuthError extends DispatchError {}
