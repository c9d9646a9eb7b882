/**
 * Structured logging contract shared across backend services.
 *
 * Services depend on this interface instead of importing Pino directly, which
 * keeps them testable with `vi.fn()` loggers. Every method accepts either a
 * plain message or a structured object followed by a message, mirroring the
 * Pino call style.
 */
export interface ILogger {
    /**
     * Emit a fatal-level log entry.
     *
     * Fatal logs signal unrecoverable errors that terminate the process, such
     * as invalid startup configuration.
     */
    fatal(objOrMessage: object | string, message?: string): void;

    /**
     * Emit an error-level log entry.
     *
     * @param objOrMessage - Structured context (error, request id) or a plain message
     * @param message - Message when the first argument is a context object
     */
    error(objOrMessage: object | string, message?: string): void;

    /**
     * Emit a warning-level log entry.
     *
     * Warnings highlight unusual but non-fatal behavior such as upstream
     * retries or rejected credentials.
     */
    warn(objOrMessage: object | string, message?: string): void;

    /**
     * Emit an info-level log entry.
     */
    info(objOrMessage: object | string, message?: string): void;

    /**
     * Emit a debug-level log entry.
     *
     * Debug logs capture per-request diagnostic details and are suppressed in
     * production by default.
     */
    debug(objOrMessage: object | string, message?: string): void;

    /**
     * Emit a trace-level log entry.
     */
    trace(objOrMessage: object | string, message?: string): void;

    /**
     * Create a scoped child logger with predefined bindings.
     *
     * Child loggers attach consistent metadata (such as `module: 'upstream'`)
     * to every entry without repeating bindings manually.
     *
     * @param bindings - Static key-value pairs merged into each log entry
     * @param options - Logger options such as a level override for this child
     * @returns A logger that inherits from the current instance while applying the bindings
     */
    child(bindings: Record<string, unknown>, options?: ILoggerChildOptions): ILogger;
}

/**
 * Options accepted when creating a child logger.
 */
export interface ILoggerChildOptions {
    /**
     * Minimum level for the child (e.g. 'warn'), overriding the parent level.
     */
    level?: string;
}
