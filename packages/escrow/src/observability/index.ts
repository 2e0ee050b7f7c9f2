/**
 * Observability Module
 */

// Type-only exports
export type { EscrowMetrics } from './metrics.js';

// Value exports
export { NoOpMetrics, ConsoleMetrics } from './metrics.js';
