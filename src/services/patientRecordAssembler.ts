import { RecordAssemblyError } from '../errors';
import type {
  HealthStatus,
  LabResult,
  PatientRecord,
  QuestionnaireResponses,
} from '../types/patient';

export interface AssemblePatientRecordInput {
  patientId: string;
  healthStatus: HealthStatus;
  questionnaireResponses: QuestionnaireResponses;
  labTestResults: LabResult[];
  createdAt: Date;
}

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach((child) => deepFreeze(child));
  }
  return value;
};

/**
 * Compose a patient record. Pure: copies its inputs and returns a frozen
 * record whose metadata counts match its collections.
 */
export function assemblePatientRecord(input: AssemblePatientRecordInput): Readonly<PatientRecord> {
  if (!input.patientId) {
    throw new RecordAssemblyError('Patient record requires a patientId');
  }
  if (Number.isNaN(input.createdAt.getTime())) {
    throw new RecordAssemblyError(`Invalid creation time for ${input.patientId}`);
  }

  const questionnaireResponses: QuestionnaireResponses = structuredClone(input.questionnaireResponses);
  const labTestResults = input.labTestResults.map((result) => ({ ...result }));
  const timestamp = input.createdAt.toISOString();

  const record: PatientRecord = {
    patientId: input.patientId,
    timestamp,
    healthStatus: input.healthStatus,
    questionnaireResponses,
    labTestResults,
    metadata: {
      totalForms: Object.keys(questionnaireResponses).length,
      totalLabTests: labTestResults.length,
      generatedAt: timestamp,
    },
  };

  assertRecordConsistent(record);
  return deepFreeze(record);
}

export function assertRecordConsistent(record: PatientRecord): void {
  const formCount = Object.keys(record.questionnaireResponses).length;
  if (record.metadata.totalForms !== formCount) {
    throw new RecordAssemblyError(
      `${record.patientId}: metadata.totalForms ${record.metadata.totalForms} != ${formCount}`,
    );
  }
  if (record.metadata.totalLabTests !== record.labTestResults.length) {
    throw new RecordAssemblyError(
      `${record.patientId}: metadata.totalLabTests ${record.metadata.totalLabTests} != ${record.labTestResults.length}`,
    );
  }
  for (const result of record.labTestResults) {
    const inRange = result.value >= result.minRange && result.value <= result.maxRange;
    const consistent =
      (result.status === 'Normal' && inRange) ||
      (result.status === 'Low' && result.value < result.minRange) ||
      (result.status === 'High' && result.value > result.maxRange);
    if (!consistent) {
      throw new RecordAssemblyError(
        `${record.patientId}: ${result.testAttributeName} value ${result.value} contradicts status ${result.status}`,
      );
    }
  }
}
