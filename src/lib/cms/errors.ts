export class CmsError extends Error {
    readonly statusCode: number;

    constructor(message: string, statusCode: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = this.constructor.name;
        this.statusCode = statusCode;
    }
}

export class NotFoundError extends CmsError {
    constructor(message: string) {
        super(message, 404);
    }
}

export class InvalidStateError extends CmsError {
    constructor(message: string) {
        super(message, 400);
    }
}

export class ConflictError extends CmsError {
    constructor(message: string) {
        super(message, 409);
    }
}

/** Two writers allocated the same (page, version_number) pair. */
export class VersionNumberConflictError extends ConflictError {
    constructor(pageId: number, versionNumber: number) {
        super(`Version number ${versionNumber} already exists for page ${pageId}`);
    }
}

/** Unexpected failure inside a version lifecycle operation; keeps the original as `cause`. */
export class VersionServiceError extends CmsError {
    constructor(message: string, cause: unknown) {
        super(message, 500, { cause });
    }
}

export function isClientError(error: unknown): error is CmsError {
    return error instanceof CmsError && error.statusCode >= 400 && error.statusCode < 500;
}
