/**
 * @module
 * The main entry point. Exports the callback list types, the adapter and
 * combiner, the execution decorators and the invocation primitives.
 */

// Core types (EventArgs, EventHandler, ElementaryCallback)
export * from './types';

// Building and inspecting callback lists
export * from './handler';

// Shape adaptation and composition
export * from './adapt';
export * from './combine';

// Execution decorators
export * from './resilient';
export * from './parallel';
export * from './background';
export * from './enhancers';

// Invocation
export * from './raise';

// Error types and the Result-based fault channel
export * from './errors';

// Scheduling and configuration
export * from './scheduler';
export * from './config';
