/**
 * Workbench Capabilities
 *
 * Optional features of the workbench (plotting, optimization, molecular
 * viewer, cheminformatics) as an explicit record, and the notices the shell
 * shows when one of them is unavailable.
 *
 * @tested tests/property/workbench-state.property.test.ts
 */

import { z } from 'zod';

/**
 * Capabilities schema
 */
export const CapabilitiesSchema = z.object({
  plotting: z.boolean(),
  optimization: z.boolean(),
  molecularViewer: z.boolean(),
  cheminformatics: z.boolean(),
});

export type Capabilities = z.infer<typeof CapabilitiesSchema>;

export type CapabilityName = keyof Capabilities;

/**
 * Capabilities assumed when nothing is detected
 */
export const DEFAULT_CAPABILITIES: Readonly<Capabilities> = Object.freeze({
  plotting: true,
  optimization: true,
  molecularViewer: true,
  cheminformatics: false,
});

// Notice level enumeration
export const NoticeLevel = {
  WARNING: 'warning',
  INFO: 'info',
} as const;

export type NoticeLevel = (typeof NoticeLevel)[keyof typeof NoticeLevel];

/**
 * Notice shown for a missing capability
 */
export interface CapabilityNotice {
  capability: CapabilityName;
  level: NoticeLevel;
  message: string;
}

/**
 * Builds a capabilities record from defaults and overrides
 */
export function createCapabilities(overrides: Partial<Capabilities> = {}): Capabilities {
  return CapabilitiesSchema.parse({ ...DEFAULT_CAPABILITIES, ...overrides });
}

/**
 * Notices for the capabilities that are unavailable, optimization first.
 * Molecular viewer and cheminformatics have no notice: the views that use
 * them degrade silently.
 */
export function describeMissingCapabilities(capabilities: Capabilities): CapabilityNotice[] {
  const notices: CapabilityNotice[] = [];

  if (!capabilities.optimization) {
    notices.push({
      capability: 'optimization',
      level: NoticeLevel.WARNING,
      message: '⚠️ Optimization library not available. AI optimization disabled.',
    });
  }

  if (!capabilities.plotting) {
    notices.push({
      capability: 'plotting',
      level: NoticeLevel.INFO,
      message: 'ℹ️ Plotting library not available. 3D view disabled.',
    });
  }

  return notices;
}
