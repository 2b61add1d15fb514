/**
 * Error taxonomy of the tracker.
 * Duplicate registrations and duplicate matches are not errors: the repositories report them as `false`.
 */

interface TrackerErrorOptions {
    cause?: unknown;
}

/** Upstream statistics API unreachable, rate-limited, timed out, or returned unparseable data. */
export class DataSourceError extends Error {
    readonly status: number | undefined;

    constructor(message: string, { cause, status }: TrackerErrorOptions & { status?: number } = {}) {
        super(message, { cause });
        this.name = 'DataSourceError';
        this.status = status;
    }
}

/** Store unreachable, or a constraint violation other than the expected uniqueness conflict. */
export class PersistenceError extends Error {
    constructor(message: string, { cause }: TrackerErrorOptions = {}) {
        super(message, { cause });
        this.name = 'PersistenceError';
    }
}

/** Recipient unknown, or rejects direct messages. */
export class NotificationDeliveryError extends Error {
    readonly owner_id: string;

    constructor(owner_id: string, message: string, { cause }: TrackerErrorOptions = {}) {
        super(message, { cause });
        this.name = 'NotificationDeliveryError';
        this.owner_id = owner_id;
    }
}

export class ConfigError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}
