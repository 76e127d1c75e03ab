import type { Question, QuestionnaireForm } from '../../types/glossary';
import type { FormAnswers, HealthStatus } from '../../types/patient';

export type AnswerRequest = {
  formKey: string;
  form: QuestionnaireForm;
  /** The questions still needing an answer (a subset of form.questions) */
  questions: Question[];
  healthStatus: HealthStatus;
  patientId: string;
};

export interface AnswerProvider {
  readonly name: string;
  /**
   * Answer the requested questions. Implementations may return a partial
   * mapping; callers fill the gaps.
   */
  answerForm(request: AnswerRequest): Promise<FormAnswers>;
}
