import type { KeyedForm, Question } from '../types/glossary';
import { type FormAnswers, type HealthStatus, createFormAnswers } from '../types/patient';
import type { AnswerProvider } from './answerProviders/AnswerProvider';

const PATIENT_ID_PATTERN = /patient\s*id/i;

export const isPatientIdQuestion = (question: Question): boolean =>
  PATIENT_ID_PATTERN.test(question.text);

/**
 * Produces the answers for one questionnaire form.
 *
 * Patient-id questions are answered locally; everything else goes through
 * the answer provider. The result lists every question in form order.
 */
export class ResponseGenerator {
  constructor(private readonly provider: AnswerProvider) {}

  async generate(
    { formKey, form }: KeyedForm,
    healthStatus: HealthStatus,
    patientId: string,
  ): Promise<FormAnswers> {
    const pending = form.questions.filter((question) => !isPatientIdQuestion(question));
    const provided = pending.length
      ? await this.provider.answerForm({
          formKey,
          form,
          questions: pending,
          healthStatus,
          patientId,
        })
      : createFormAnswers();

    const answers = createFormAnswers();
    for (const question of form.questions) {
      if (isPatientIdQuestion(question)) {
        answers[question.id] = patientId;
        continue;
      }
      const answer = Object.hasOwn(provided, question.id) ? provided[question.id] : undefined;
      if (answer === undefined) {
        throw new Error(`No answer produced for question ${question.id} in form ${formKey}`);
      }
      answers[question.id] = answer;
    }
    return answers;
  }
}
