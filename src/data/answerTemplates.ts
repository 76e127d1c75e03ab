import type { HealthStatus } from '../types/patient';

/**
 * Choice wording that reads as a symptom or concern. Rule-based answers
 * lean toward these for low/high patients and away from them otherwise.
 */
export const SYMPTOMATIC_OPTION_PATTERNS: readonly RegExp[] = [
  /^yes\b/i,
  /\boften\b/i,
  /\balways\b/i,
  /\bdaily\b/i,
  /\bfrequently\b/i,
  /\bsevere\b/i,
  /\bhigh\b/i,
  /\bpoor\b/i,
  /\bmoderate\b/i,
  /\bworse\b/i,
  /\bweekly\b/i,
];

export const TEXT_ANSWER_TEMPLATES: Record<HealthStatus, readonly string[]> = {
  normal: [
    'No specific concerns at this time',
    'Not applicable to my situation',
    'Nothing unusual that I have noticed',
    'I feel generally well',
  ],
  low: [
    'I have been feeling tired and low on energy lately',
    'Yes, I have noticed this over the past few months',
    'Occasionally, but it is getting harder to manage',
    'Varies from day to day, mostly worse in the mornings',
  ],
  high: [
    'Yes, this has been bothering me frequently',
    'I have noticed this getting worse recently',
    'Often, especially after meals or exertion',
    'Varies from day to day, but it is more noticeable than before',
  ],
};
