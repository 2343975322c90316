import { randomBytes } from 'node:crypto';

/**
 * Generate a short run ID for tracing one batch through the log.
 * Format: date prefix + random suffix (e.g., "20260115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
    const datePart = now.toISOString().slice(0, 10).replace(/-/g, '');
    const randomPart = randomBytes(3).toString('hex');
    return `${datePart}-${randomPart}`;
}
