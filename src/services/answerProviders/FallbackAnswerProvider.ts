import * as logger from 'firebase-functions/logger';
import { ApiError } from '../../errors';
import { type FormAnswers, createFormAnswers } from '../../types/patient';
import type { AnswerProvider, AnswerRequest } from './AnswerProvider';

/**
 * Tries the primary provider and recovers any ApiError with the fallback.
 * Questions the primary left unanswered are filled by the fallback too.
 */
export class FallbackAnswerProvider implements AnswerProvider {
  readonly name: string;

  constructor(
    private readonly primary: AnswerProvider,
    private readonly fallback: AnswerProvider,
  ) {
    this.name = `${primary.name}+${fallback.name}`;
  }

  async answerForm(request: AnswerRequest): Promise<FormAnswers> {
    let answers: FormAnswers = createFormAnswers();
    try {
      answers = await this.primary.answerForm(request);
    } catch (error) {
      if (!(error instanceof ApiError)) {
        throw error;
      }
      logger.warn(`[AnswerProvider] ${this.primary.name} failed, using ${this.fallback.name}`, {
        formKey: request.formKey,
        patientId: request.patientId,
        error: error.message,
        status: error.status,
      });
    }

    const missing = request.questions.filter((question) => !Object.hasOwn(answers, question.id));
    if (missing.length === 0) {
      return answers;
    }

    const filled = await this.fallback.answerForm({ ...request, questions: missing });
    return Object.assign(createFormAnswers(), answers, filled);
  }
}
