/**
 * Debug logging utilities for the server and CLI.
 * Starts enabled when the process runs with DEBUG=true (or DEBUG=1); entry points
 * override it from their loaded configuration with setDebugEnabled.
 */

export function isDebugEnabled(value: string | undefined): boolean {
    return value === "true" || value === "1";
}

let enabled = isDebugEnabled(process.env.DEBUG);

export function setDebugEnabled(value: boolean): void {
    enabled = value;
}

export function isDebugLogging(): boolean {
    return enabled;
}

/**
 * Log only when debugging. Use for verbose output such as per-page geometry.
 * Errors and warnings should use console.error/console.warn directly.
 */
export function debugLog(...args: unknown[]): void {
    if (!enabled) return;
    console.log(new Date().toISOString(), ...args);
}
