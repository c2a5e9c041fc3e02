export type StopsGraphErrorKind =
    | "MalformedRecord"
    | "MissingRequiredField"
    | "InvalidCoordinate"
    | "MissingCoordinate";

/**
 * Base class for data-quality failures. None of these are fatal: ingestion
 * and filtering catch them per record / per subject and keep going.
 */
export abstract class StopsGraphError extends Error {
    abstract readonly kind: StopsGraphErrorKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class MalformedRecordError extends StopsGraphError {
    readonly kind = "MalformedRecord";

    constructor(readonly fieldCount: number, readonly expected = 6) {
        super(`malformed record: expected at least ${expected} fields, got ${fieldCount}`);
    }
}

export class MissingRequiredFieldError extends StopsGraphError {
    readonly kind = "MissingRequiredField";

    constructor(readonly field: string) {
        super(`missing required field: ${field}`);
    }
}

export class InvalidCoordinateError extends StopsGraphError {
    readonly kind = "InvalidCoordinate";

    constructor(readonly field: string, readonly text: string) {
        super(`invalid ${field} coordinate: "${text}"`);
    }
}

export class MissingCoordinateError extends StopsGraphError {
    readonly kind = "MissingCoordinate";

    constructor(readonly subject: string, readonly predicate: string) {
        super(`${subject} has no ${predicate} fact`);
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
