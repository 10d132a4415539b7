/**
 * Core Ports
 *
 * Exports all port interfaces (contracts) for the rate counter.
 * Ports define the boundaries between the counter domain and store adapters.
 */

// Sliding Window Store Protocol
export type { IncrementResult, SlidingWindowStore } from './sliding-window.js';
