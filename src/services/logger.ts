/**
 * Components log through this narrow slice of the console so tests can
 * pass a silent or capturing logger.
 */
export type Logger = Pick<Console, "log" | "warn" | "error">;
