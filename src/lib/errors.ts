// File: src/lib/errors.ts

export class StubwrightError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** IO failure while creating, reading or deleting a path. Aborts the current sweep. */
export class FilesystemError extends StubwrightError {
    readonly operation: string;
    readonly path: string;

    constructor(operation: string, filePath: string, cause: unknown) {
        const reason = typeof cause === 'object' && cause !== null && 'message' in cause
            ? String(cause.message)
            : String(cause);
        super(`Failed to ${operation} ${filePath}: ${reason}`, { cause });
        this.operation = operation;
        this.path = filePath;
    }
}

export interface FixtureLocation {
    file: string;
    line: number;
}

export interface FixtureConflict {
    name: string;
    first: FixtureLocation;
    duplicate: FixtureLocation;
}

export class FixtureConflictError extends StubwrightError {
    readonly conflicts: FixtureConflict[];

    constructor(conflicts: FixtureConflict[]) {
        const lines = conflicts.map(c =>
            `  '${c.name}' in ${c.duplicate.file}:${c.duplicate.line} (first defined in ${c.first.file}:${c.first.line})`
        );
        super(`Duplicate fixture names found:\n${lines.join('\n')}`);
        this.conflicts = conflicts;
    }
}

/** A file sitting in a stub tree that does not follow the mirrored naming convention. Never fatal. */
export class TemplateMismatchError extends StubwrightError {
    readonly path: string;

    constructor(filePath: string, reason: string) {
        super(`${filePath}: ${reason}`);
        this.path = filePath;
    }
}

export class ManagedRegionError extends StubwrightError {
    readonly path: string;

    constructor(filePath: string, reason: string) {
        super(`Cannot update managed region in ${filePath}: ${reason}`);
        this.path = filePath;
    }
}

export class ConfigError extends StubwrightError {
    readonly path: string;

    constructor(configPath: string, reason: string) {
        super(`Invalid configuration in ${configPath}: ${reason}`);
        this.path = configPath;
    }
}
