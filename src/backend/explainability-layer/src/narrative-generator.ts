/**
 * Narrative Generator
 *
 * Generates human-readable explanations for a design evaluation: a summary
 * of the scores, the strongest delivery factors, weak factors, and the
 * regulatory checklist status.
 *
 * @tested tests/property/explainability.property.test.ts
 */

import type { ChecklistResult, DesignEvaluation } from '@nanoeval/shared';

import { analyzeFactors, type AnalyzedFactor, type WeakFactor } from './factor-analyzer.js';

/**
 * Explanation containing all narrative components
 */
export interface EvaluationExplanation {
  summary: string;
  strengthsNarrative: string;
  concernsNarrative: string | null;
  checklistNarrative: string;
  fullNarrative: string;
}

/**
 * Options for narrative generation
 */
export interface NarrativeOptions {
  topN?: number;
  includeChecklist?: boolean;
}

/**
 * Default narrative options
 */
export const DEFAULT_NARRATIVE_OPTIONS: Required<NarrativeOptions> = {
  topN: 3,
  includeChecklist: true,
};

/**
 * Generates a human-readable name for a delivery factor
 */
export function humanizeFactor(factorName: string): string {
  const nameMap: Record<string, string> = {
    size: 'core size',
    charge: 'surface charge',
    encapsulation: 'encapsulation efficiency',
    pdi: 'size uniformity',
    hydrodynamic: 'hydrodynamic profile',
    stability: 'colloidal stability',
  };

  return nameMap[factorName] || factorName.replace(/([A-Z])/g, ' $1').toLowerCase().trim();
}

/**
 * Generates the summary sentence
 */
export function generateSummary(evaluation: DesignEvaluation): string {
  const { designId, overallScore, impact } = evaluation;
  return (
    `Design ${designId} scores ${overallScore.toFixed(1)}/100 overall ` +
    `(delivery ${impact.Delivery.toFixed(1)}, toxicity ${impact.Toxicity.toFixed(1)}/10, ` +
    `cost ${impact.Cost.toFixed(1)}/100).`
  );
}

/**
 * Joins items into an English list: "a", "a and b", "a, b, and c"
 */
export function joinWithAnd(items: string[]): string {
  if (items.length <= 2) {
    return items.join(' and ');
  }
  return `${items.slice(0, -1).join(', ')}, and ${items[items.length - 1]}`;
}

function generateStrengthsNarrative(topContributors: AnalyzedFactor[]): string {
  if (topContributors.length === 0) {
    return 'No significant delivery factors identified.';
  }

  const descriptions = topContributors.map(
    (af) => `${humanizeFactor(af.factor.name)} (${af.factor.value.toFixed(0)})`
  );

  if (descriptions.length === 1) {
    return `The primary strength is ${descriptions[0]}.`;
  }

  return `Key strengths include ${joinWithAnd(descriptions)}.`;
}

function generateConcernsNarrative(weakFactors: WeakFactor[]): string | null {
  if (weakFactors.length === 0) {
    return null;
  }

  const parts: string[] = [];
  const groups: Array<[WeakFactor['severity'], string]> = [
    ['high', 'Critical concerns'],
    ['medium', 'Moderate concerns'],
    ['low', 'Minor concerns'],
  ];

  for (const [severity, heading] of groups) {
    const descriptions = weakFactors
      .filter((wf) => wf.severity === severity)
      .map((wf) => wf.description);
    if (descriptions.length > 0) {
      parts.push(`${heading}: ${descriptions.join('; ')}`);
    }
  }

  return parts.join('. ') + '.';
}

/**
 * Generates the regulatory checklist sentence
 */
export function generateChecklistNarrative(checklist: ChecklistResult): string {
  if (checklist.passed === checklist.total) {
    return `All ${checklist.total} regulatory checks pass.`;
  }

  const failing = checklist.items.filter((item) => !item.passed).map((item) => item.label);
  return `${checklist.passed} of ${checklist.total} regulatory checks pass; failing: ${failing.join(', ')}.`;
}

/**
 * Generates a complete explanation for a design evaluation
 */
export function generateEvaluationExplanation(
  evaluation: DesignEvaluation,
  options: NarrativeOptions = {}
): EvaluationExplanation {
  const opts = { ...DEFAULT_NARRATIVE_OPTIONS, ...options };
  const analysis = analyzeFactors(evaluation.deliveryBreakdown, { topN: opts.topN });

  const summary = generateSummary(evaluation);
  const strengthsNarrative = generateStrengthsNarrative(analysis.topContributors);
  const concernsNarrative = generateConcernsNarrative(analysis.weakFactors);
  const checklistNarrative = generateChecklistNarrative(evaluation.checklist);

  const parts = [summary, strengthsNarrative];
  if (concernsNarrative) {
    parts.push(concernsNarrative);
  }
  if (opts.includeChecklist) {
    parts.push(checklistNarrative);
  }

  return {
    summary,
    strengthsNarrative,
    concernsNarrative,
    checklistNarrative,
    fullNarrative: parts.join(' '),
  };
}

/**
 * Full narrative for a design evaluation
 */
export function generateEvaluationNarrative(
  evaluation: DesignEvaluation,
  options: NarrativeOptions = {}
): string {
  return generateEvaluationExplanation(evaluation, options).fullNarrative;
}
