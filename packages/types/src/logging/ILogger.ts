/**
 * Structured logging contract shared by backend services.
 *
 * Services depend on this interface instead of on Pino directly so tests can
 * pass a stub. Arguments are forwarded untouched: an object first for context,
 * then a message string.
 */
export interface ILogger {
    fatal(...args: readonly unknown[]): void;

    /**
     * Recoverable failures that still need attention.
     */
    error(...args: readonly unknown[]): void;

    warn(...args: readonly unknown[]): void;

    info(...args: readonly unknown[]): void;

    debug(...args: readonly unknown[]): void;

    trace(...args: readonly unknown[]): void;

    /**
     * Create a scoped logger that adds `bindings` to every entry.
     *
     * @example
     * const log = logger.child({ module: 'pages' });
     * log.info({ pageId }, 'Page created');
     */
    child(bindings: Record<string, unknown>): ILogger;
}
