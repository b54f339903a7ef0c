/**
 * View Registry
 *
 * Single definition of the workbench views. Each view declares the
 * capability it needs; views whose capability is missing are hidden.
 *
 * @tested tests/property/workbench-state.property.test.ts
 */

import { DEFAULT_CAPABILITIES, type Capabilities, type CapabilityName } from './capabilities.js';

/**
 * View specification
 */
export interface ViewSpec {
  readonly key: string;
  readonly title: string;
  readonly order: number;
  readonly enabled: boolean;
  readonly requires?: CapabilityName;
}

/**
 * All workbench views
 */
export const VIEW_SPECS: readonly ViewSpec[] = [
  { key: 'home', title: 'Home', order: 10, enabled: true },
  { key: 'materials', title: 'Materials', order: 20, enabled: true },
  { key: 'design', title: 'Design', order: 30, enabled: true },
  { key: 'delivery', title: 'Delivery', order: 40, enabled: true },
  { key: 'toxicity', title: 'Toxicity', order: 50, enabled: true },
  { key: 'cost', title: 'Cost', order: 60, enabled: true },
  { key: 'protocol', title: 'Protocol', order: 70, enabled: true },
  { key: 'quiz', title: 'Quiz', order: 80, enabled: true },
  { key: 'view3d', title: '3D View', order: 90, enabled: true, requires: 'plotting' },
  { key: 'optimize', title: 'Optimize', order: 100, enabled: true, requires: 'optimization' },
];

/**
 * Title of the view a new session opens on
 */
export const HOME_VIEW_TITLE = 'Home';

/**
 * Enabled views whose required capability is present, sorted by order
 */
export function getAvailableViews(
  capabilities: Capabilities = DEFAULT_CAPABILITIES,
  specs: readonly ViewSpec[] = VIEW_SPECS
): ViewSpec[] {
  return specs
    .filter((spec) => spec.enabled && (spec.requires === undefined || capabilities[spec.requires]))
    .sort((a, b) => a.order - b.order);
}

/**
 * Titles of the available views, in display order
 */
export function getViewTitles(capabilities: Capabilities = DEFAULT_CAPABILITIES): string[] {
  return getAvailableViews(capabilities).map((spec) => spec.title);
}

/**
 * Finds an available view by title
 */
export function findView(
  title: string,
  capabilities: Capabilities = DEFAULT_CAPABILITIES
): ViewSpec | undefined {
  return getAvailableViews(capabilities).find((spec) => spec.title === title);
}
