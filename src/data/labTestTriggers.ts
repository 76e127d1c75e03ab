/**
 * Lab test groups drawn for every patient, and the groups added when
 * questionnaire answers mention a related keyword.
 */

export const DEFAULT_LAB_TEST_GROUPS: readonly string[] = [
  'GENERAL PATHOLOGY',
  'LIVER PROFILE',
  'RENAL PROFILE',
  'LIPID PROFILE',
  'DIABETES',
  'THYROID',
  'VITAMINS',
];

export interface LabTestTrigger {
  keywords: readonly string[];
  groups: readonly string[];
}

export const LAB_TEST_TRIGGERS: readonly LabTestTrigger[] = [
  {
    keywords: ['hormone', 'menstrual', 'fertility'],
    groups: ['FERTILITY (FEMALE)', 'FERTILITY (MALE)', 'ADRENAL HORMONES'],
  },
  {
    keywords: ['allergy', 'allergic', 'sensitivity'],
    groups: ['ALLERGY - SPECIFIC IgE'],
  },
  {
    keywords: ['heart', 'cardiac', 'chest'],
    groups: ['CARDIAC MARKERS'],
  },
  {
    keywords: ['joint', 'arthritis', 'pain'],
    groups: ['ARTHRITIS', 'AUTOIMMUNE'],
  },
];

export const DEFAULT_MAX_LAB_TESTS_PER_PATIENT = 20;
