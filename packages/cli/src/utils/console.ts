/**
 * Formatted console output helpers for the command summary.
 * Run-time events go through the logger instead.
 */

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function fail(message: string): void {
    console.error(`✖ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}
