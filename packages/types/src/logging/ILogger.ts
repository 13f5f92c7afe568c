/**
 * Structured logging contract shared by the builder services.
 *
 * Services take an ILogger through their constructors instead of importing the
 * process-wide logger, so tests can hand in a recording mock. The builder
 * satisfies it with a Pino instance; `child()` scopes every entry with fixed
 * bindings such as `{ module: 'assembler' }`.
 */
export interface ILogger {
    /**
     * Unrecoverable failure that ends the build.
     */
    fatal(...args: readonly unknown[]): void;

    /**
     * Failure that needs attention, usually followed by a thrown error.
     */
    error(...args: readonly unknown[]): void;

    /**
     * Unusual but non-fatal event, such as a document skipped in skip-invalid mode.
     */
    warn(...args: readonly unknown[]): void;

    /**
     * Normal milestone of a build step.
     */
    info(...args: readonly unknown[]): void;

    /**
     * Per-document diagnostic detail.
     */
    debug(...args: readonly unknown[]): void;

    /**
     * Most verbose tracing, disabled outside targeted debugging.
     */
    trace(...args: readonly unknown[]): void;

    /**
     * Create a scoped logger whose entries carry `bindings`.
     *
     * @param bindings - Key-value pairs merged into every entry
     * @param options - Logger-specific options such as a level override
     */
    child(bindings: Record<string, unknown>, options?: Record<string, unknown>): ILogger;
}
