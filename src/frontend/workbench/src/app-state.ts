/**
 * Workbench Application State
 *
 * Session state for the workbench shell. State is an explicit value: every
 * call to createAppState returns a fresh object and updates return new
 * objects rather than mutating.
 *
 * @tested tests/property/workbench-state.property.test.ts
 */

import type { Design } from '@nanoeval/shared';

import { createCapabilities, type Capabilities } from './capabilities.js';
import { findView, HOME_VIEW_TITLE } from './view-registry.js';

/**
 * Named design held in the session
 */
export interface SessionDesign {
  designId: string;
  design: Design;
}

/**
 * Workbench session state
 */
export interface AppState {
  activeView: string;
  sidebarCollapsed: boolean;
  materials: string[];
  designs: SessionDesign[];
  capabilities: Capabilities;
  debug: boolean;
}

/**
 * Raised when a view title is not an available view
 */
export class UnknownViewError extends Error {
  constructor(public readonly title: string) {
    super(`Unknown view: ${title}`);
    this.name = 'UnknownViewError';
  }
}

/**
 * Creates a fresh session state from defaults and overrides
 *
 * @throws UnknownViewError if the active view override is not available
 */
export function createAppState(overrides: Partial<AppState> = {}): AppState {
  const capabilities = createCapabilities(overrides.capabilities);
  const activeView = overrides.activeView ?? HOME_VIEW_TITLE;

  if (!findView(activeView, capabilities)) {
    throw new UnknownViewError(activeView);
  }

  return {
    activeView,
    sidebarCollapsed: overrides.sidebarCollapsed ?? false,
    materials: [...(overrides.materials ?? [])],
    designs: [...(overrides.designs ?? [])],
    capabilities,
    debug: overrides.debug ?? false,
  };
}

/**
 * Returns a new state with the given view active
 *
 * @throws UnknownViewError if the title is not an available view
 */
export function setActiveView(state: AppState, title: string): AppState {
  if (!findView(title, state.capabilities)) {
    throw new UnknownViewError(title);
  }
  return { ...state, activeView: title };
}

/**
 * Returns a new state with a design added, replacing one with the same id
 */
export function addDesign(state: AppState, entry: SessionDesign): AppState {
  return {
    ...state,
    designs: [...state.designs.filter((d) => d.designId !== entry.designId), entry],
  };
}

/**
 * Returns a new state with the sidebar toggled
 */
export function toggleSidebar(state: AppState): AppState {
  return { ...state, sidebarCollapsed: !state.sidebarCollapsed };
}
