/**
 * Workbench
 *
 * Presentation-layer state: capabilities, session state and the view registry.
 */

export * from './capabilities.js';
export * from './view-registry.js';
export * from './app-state.js';
