/**
 * Regulatory Checklist
 *
 * Evaluates a fixed set of named compliance predicates against a design and
 * reports the share that pass. The sterilization item is a placeholder that
 * always passes until sterilization data is captured; it stays in the list
 * so the denominator remains 8.
 *
 * @tested tests/property/regulatory-checklist.property.test.ts
 */

import {
  DEFAULT_APPROVED_MATERIALS,
  resolveDesign,
  type ChecklistItem,
  type ChecklistResult,
  type Design,
  type Material,
  type ResolvedDesign,
} from '@nanoeval/shared';

/**
 * A named compliance predicate
 */
export interface ChecklistRule {
  id: string;
  label: string;
  check: (design: ResolvedDesign, approvedMaterials: readonly Material[]) => boolean;
}

/**
 * Checklist rules in reporting order
 */
export const CHECKLIST_RULES: readonly ChecklistRule[] = [
  {
    id: 'size-limit',
    label: 'Size ≤ 200nm',
    check: (d) => d.Size <= 200,
  },
  {
    id: 'pdi-limit',
    label: 'PDI < 0.3',
    check: (d) => d.PDI < 0.3,
  },
  {
    id: 'charge-limit',
    label: 'Charge within ±30mV',
    check: (d) => Math.abs(d.Charge) <= 30,
  },
  {
    id: 'encapsulation-minimum',
    label: 'Encapsulation ≥ 70%',
    check: (d) => d.Encapsulation >= 70,
  },
  {
    id: 'stability-minimum',
    label: 'Stability ≥ 80%',
    check: (d) => d.Stability >= 80,
  },
  {
    id: 'material-approved',
    label: 'Material approved for medical use',
    check: (d, approved) => d.Material !== undefined && approved.includes(d.Material),
  },
  {
    id: 'degradation-characterized',
    label: 'Degradation products characterized',
    check: (d) => d.DegradationTime < 90,
  },
  {
    id: 'sterilization-defined',
    label: 'Sterilization method defined',
    check: () => true,
  },
];

/**
 * Evaluates the checklist for a resolved design
 */
export function evaluateChecklist(
  design: ResolvedDesign,
  approvedMaterials: readonly Material[] = DEFAULT_APPROVED_MATERIALS
): ChecklistResult {
  const items: ChecklistItem[] = CHECKLIST_RULES.map((rule) => ({
    id: rule.id,
    label: rule.label,
    passed: rule.check(design, approvedMaterials),
  }));

  const passed = items.filter((item) => item.passed).length;
  const total = items.length;

  return {
    items,
    passed,
    total,
    percentage: (passed / total) * 100.0,
  };
}

/**
 * Regulatory checklist for a design
 *
 * @throws DesignValidationError for a missing required parameter or invalid value
 */
export function regulatoryChecklist(
  design: Design,
  approvedMaterials: readonly Material[] = DEFAULT_APPROVED_MATERIALS
): ChecklistResult {
  return evaluateChecklist(resolveDesign(design), approvedMaterials);
}

/**
 * Pass percentage (0-100) of the regulatory checklist
 */
export function checklistScore(
  design: Design,
  approvedMaterials: readonly Material[] = DEFAULT_APPROVED_MATERIALS
): number {
  return regulatoryChecklist(design, approvedMaterials).percentage;
}
