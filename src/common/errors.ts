/**
 * Raised when the raw log text cannot be retrieved from its location.
 * Fatal for the run; never retried.
 */
export class TransportError extends Error {
    readonly location: string;

    constructor(location: string, cause: unknown) {
        super(
            `Cannot fetch ${location}: ${
                cause instanceof Error ? cause.message : String(cause)
            }`,
            { cause }
        );
        this.name = "TransportError";
        this.location = location;
    }
}
