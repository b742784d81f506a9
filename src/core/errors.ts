/**
 * Error types
 *
 * Only argument validation can fail. Everything that is merely "not available
 * yet" (an estimator still bootstrapping, an untracked probability) is reported
 * as `undefined` instead of an error.
 */

/**
 * Raised when a probability or run parameter is out of range.
 */
export class InvalidArgumentError extends Error {
    /** The rejected input */
    readonly value: unknown;

    constructor(message: string, value: unknown) {
        super(message);
        this.name = "InvalidArgumentError";
        this.value = value;
    }
}
