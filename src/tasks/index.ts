/**
 * @fileoverview Tasks module - tracked invocations, their events and the
 * tool model kept beside them.
 *
 * @module tasks
 */

export * from './types';
export * from './listenerRegistry';
export * from './taskEvents';
export * from './singleFlight';
export * from './modelCache';
export * from './taskExecutionEngine';
