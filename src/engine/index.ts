/**
 * Execution Engine Layer
 *
 * Work units, output guard, scheduler and runner.
 *
 * @module breakfast-scheduler/engine
 */

export * from './errors.js';
export * from './output-guard.js';
export * from './runner.js';
export * from './scheduler.js';
export * from './types.js';
export * from './utils.js';
export * from './work-unit.js';
