/**
 * Region severity from the events recorded against it.
 */

import type { SeverityLevel } from '../../analyze/types/clinical.types';

export const SEVERITY_WINDOW_DAYS = 90;

const SEVERITY_WEIGHTS: Record<string, number> = {
  critical: 10,
  severe: 7,
  moderate: 4,
  mild: 2,
  normal: 1,
};
const UNKNOWN_SEVERITY_WEIGHT = 2;
const MIN_CONFIDENCE = 0.5;

const HIGH_ACUITY_TYPES = ['surgery', 'emergency', 'hospitalization'];
const TREATMENT_TYPES = ['medication', 'treatment'];

export interface SeverityEvent {
  severity: string;
  confidence: number;
  eventType: string;
}

function typeMultiplier(eventType: string): number {
  if (HIGH_ACUITY_TYPES.includes(eventType)) {
    return 1.5;
  }
  if (TREATMENT_TYPES.includes(eventType)) {
    return 1.2;
  }
  return 1;
}

export function calculateRegionSeverity(events: SeverityEvent[]): SeverityLevel {
  if (events.length === 0) {
    return 'NA';
  }

  let total = 0;
  const counts = { critical: 0, severe: 0, moderate: 0 };

  for (const event of events) {
    const weight = SEVERITY_WEIGHTS[event.severity] ?? UNKNOWN_SEVERITY_WEIGHT;
    total +=
      weight * Math.max(MIN_CONFIDENCE, event.confidence) * typeMultiplier(event.eventType);

    if (event.severity === 'critical' || event.severity === 'severe' || event.severity === 'moderate') {
      counts[event.severity]++;
    }
  }

  const average = total / events.length;

  if (counts.critical > 0 || average >= 8) {
    return 'critical';
  }
  if (counts.severe > 0 || average >= 6) {
    return 'severe';
  }
  if (counts.moderate > 1 || average >= 4) {
    return 'moderate';
  }
  if (events.length > 3 || average >= 2) {
    return 'mild';
  }
  return 'normal';
}
