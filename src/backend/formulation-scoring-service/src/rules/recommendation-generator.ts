/**
 * Recommendation Generator
 *
 * Derives actionable design guidance from out-of-range parameters.
 * Categories are evaluated in a fixed order (size, charge, encapsulation)
 * and each contributes at most one message.
 *
 * The size thresholds here (80 / 150 nm) are wider than the scoring band
 * (80 / 120 nm): a design scoring below 100 on size is only flagged once it
 * leaves the tolerated range.
 *
 * @tested tests/property/recommendations.property.test.ts
 */

import {
  RecommendationCategory,
  RecommendationSeverity,
  resolveDesign,
  type Design,
  type Recommendation,
  type ResolvedDesign,
} from '@nanoeval/shared';

/**
 * Thresholds that trigger a recommendation
 */
export const RECOMMENDATION_THRESHOLDS = {
  minSize: 80,
  maxSize: 150,
  highCharge: 15,
  elevatedCharge: 10,
  lowEncapsulation: 70,
  targetEncapsulation: 85,
} as const;

/**
 * Display markers per severity
 */
export const SEVERITY_MARKERS: Record<RecommendationSeverity, string> = {
  high: '🔴',
  medium: '🟡',
  pass: '✅',
};

/**
 * Recommendation catalogue keyed by id
 */
export const RECOMMENDATIONS = {
  increaseSize: {
    id: 'size.increase',
    category: RecommendationCategory.SIZE,
    severity: RecommendationSeverity.HIGH,
    message: 'Increase size to 80–120nm for better stability and circulation',
  },
  reduceSize: {
    id: 'size.reduce',
    category: RecommendationCategory.SIZE,
    severity: RecommendationSeverity.HIGH,
    message: 'Reduce size to 80–120nm for better cellular uptake',
  },
  lowerCharge: {
    id: 'charge.lower',
    category: RecommendationCategory.CHARGE,
    severity: RecommendationSeverity.HIGH,
    message: 'Lower surface charge to ±10mV for reduced toxicity',
  },
  reduceCharge: {
    id: 'charge.reduce',
    category: RecommendationCategory.CHARGE,
    severity: RecommendationSeverity.MEDIUM,
    message: 'Reduce charge closer to neutral for optimal safety',
  },
  improveEncapsulation: {
    id: 'encapsulation.improve',
    category: RecommendationCategory.ENCAPSULATION,
    severity: RecommendationSeverity.HIGH,
    message: 'Improve encapsulation to >80% for better drug delivery efficiency',
  },
  raiseEncapsulation: {
    id: 'encapsulation.aim-higher',
    category: RecommendationCategory.ENCAPSULATION,
    severity: RecommendationSeverity.MEDIUM,
    message: 'Aim for >85% encapsulation for optimal performance',
  },
  allOptimal: {
    id: 'overall.optimal',
    category: RecommendationCategory.OVERALL,
    severity: RecommendationSeverity.PASS,
    message: 'Excellent design! All parameters are within optimal ranges',
  },
} as const satisfies Record<string, Recommendation>;

function sizeRecommendation(size: number): Recommendation | null {
  if (size < RECOMMENDATION_THRESHOLDS.minSize) {
    return { ...RECOMMENDATIONS.increaseSize };
  }
  if (size > RECOMMENDATION_THRESHOLDS.maxSize) {
    return { ...RECOMMENDATIONS.reduceSize };
  }
  return null;
}

function chargeRecommendation(charge: number): Recommendation | null {
  const magnitude = Math.abs(charge);
  if (magnitude > RECOMMENDATION_THRESHOLDS.highCharge) {
    return { ...RECOMMENDATIONS.lowerCharge };
  }
  if (magnitude > RECOMMENDATION_THRESHOLDS.elevatedCharge) {
    return { ...RECOMMENDATIONS.reduceCharge };
  }
  return null;
}

function encapsulationRecommendation(encapsulation: number): Recommendation | null {
  if (encapsulation < RECOMMENDATION_THRESHOLDS.lowEncapsulation) {
    return { ...RECOMMENDATIONS.improveEncapsulation };
  }
  if (encapsulation < RECOMMENDATION_THRESHOLDS.targetEncapsulation) {
    return { ...RECOMMENDATIONS.raiseEncapsulation };
  }
  return null;
}

/**
 * Recommendations for a resolved design, in category order
 */
export function recommendationsFor(design: ResolvedDesign): Recommendation[] {
  const recommendations = [
    sizeRecommendation(design.Size),
    chargeRecommendation(design.Charge),
    encapsulationRecommendation(design.Encapsulation),
  ].filter((rec): rec is Recommendation => rec !== null);

  if (recommendations.length === 0) {
    return [{ ...RECOMMENDATIONS.allOptimal }];
  }

  return recommendations;
}

/**
 * Generates structured recommendations for a design
 *
 * @throws DesignValidationError for a missing required parameter or invalid value
 */
export function generateRecommendations(design: Design): Recommendation[] {
  return recommendationsFor(resolveDesign(design));
}

/**
 * Renders a recommendation with its severity marker
 */
export function formatRecommendation(recommendation: Recommendation): string {
  return `${SEVERITY_MARKERS[recommendation.severity]} ${recommendation.message}`;
}

/**
 * Recommendation messages for a design, each prefixed with its severity marker
 */
export function recommend(design: Design): string[] {
  return generateRecommendations(design).map(formatRecommendation);
}
