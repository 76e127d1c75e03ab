/**
 * Patient Record Type Definitions
 */

export type HealthStatus = 'normal' | 'low' | 'high';

export const HEALTH_STATUSES: readonly HealthStatus[] = ['normal', 'low', 'high'];

export type LabResultStatus = 'Normal' | 'Low' | 'High';

export type GridAnswer = Record<string, string>;

export type AnswerValue = string | number | string[] | GridAnswer;

/** questionId -> answer */
export type FormAnswers = Record<string, AnswerValue>;

/**
 * Empty answer map without a prototype, so question ids such as
 * `constructor` or `__proto__` are stored and looked up as plain keys.
 */
export const createFormAnswers = (): FormAnswers => Object.create(null);

/** formKey -> questionId -> answer */
export type QuestionnaireResponses = Record<string, FormAnswers>;

export interface LabResult {
  testGroupName: string;
  testAttributeName: string;
  value: number;
  unit: string;
  minRange: number;
  maxRange: number;
  status: LabResultStatus;
}

export interface PatientRecordMetadata {
  totalForms: number;
  totalLabTests: number;
  generatedAt: string;
}

export interface PatientRecord {
  patientId: string;
  timestamp: string;
  healthStatus: HealthStatus;
  questionnaireResponses: QuestionnaireResponses;
  labTestResults: LabResult[];
  metadata: PatientRecordMetadata;
}
