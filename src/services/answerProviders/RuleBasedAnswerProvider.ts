import { SYMPTOMATIC_OPTION_PATTERNS, TEXT_ANSWER_TEMPLATES } from '../../data/answerTemplates';
import type { Question } from '../../types/glossary';
import {
  type AnswerValue,
  type FormAnswers,
  type GridAnswer,
  type HealthStatus,
  createFormAnswers,
} from '../../types/patient';
import type { RandomSource } from '../../utils/random';
import type { AnswerProvider, AnswerRequest } from './AnswerProvider';

const PREFERRED_WEIGHT = 3;
const OTHER_WEIGHT = 1;
const DEFAULT_NUMBER_MIN = 0;
const DEFAULT_NUMBER_MAX = 10;

export const isSymptomaticOption = (option: string): boolean =>
  SYMPTOMATIC_OPTION_PATTERNS.some((pattern) => pattern.test(option));

/**
 * Answers questions from heuristics alone. Never performs I/O and never
 * fails, so it backs every other provider.
 */
export class RuleBasedAnswerProvider implements AnswerProvider {
  readonly name = 'rules';

  constructor(private readonly random: RandomSource) {}

  async answerForm(request: AnswerRequest): Promise<FormAnswers> {
    const answers = createFormAnswers();
    for (const question of request.questions) {
      answers[question.id] = this.answerQuestion(question, request.healthStatus);
    }
    return answers;
  }

  answerQuestion(question: Question, healthStatus: HealthStatus): AnswerValue {
    switch (question.type) {
      case 'multiple_choice': {
        const options = question.options ?? [];
        return options.length > 0 ? this.pickBiased(options, healthStatus) : 'Yes';
      }
      case 'checkbox':
        return this.pickCheckboxes(question.options ?? [], healthStatus);
      case 'multiple_choice_grid': {
        const columns = question.columns ?? [];
        const grid: GridAnswer = {};
        if (columns.length === 0) return grid;
        for (const row of question.rows ?? []) {
          grid[row] = this.pickBiased(columns, healthStatus);
        }
        return grid;
      }
      case 'number':
        return this.pickNumber(question, healthStatus);
      case 'text':
        return this.random.pick(TEXT_ANSWER_TEMPLATES[healthStatus]);
    }
  }

  private pickBiased(options: readonly string[], healthStatus: HealthStatus): string {
    const favourSymptoms = healthStatus !== 'normal';
    return this.random.weightedPick(
      options.map((option) => ({
        value: option,
        weight: isSymptomaticOption(option) === favourSymptoms ? PREFERRED_WEIGHT : OTHER_WEIGHT,
      })),
    );
  }

  private pickCheckboxes(options: readonly string[], healthStatus: HealthStatus): string[] {
    if (options.length === 0) return [];
    const [min, max] = healthStatus === 'normal' ? [0, 1] : [1, 3];
    const count = this.random.int(Math.min(min, options.length), Math.min(max, options.length));
    return this.random.sample(options, count);
  }

  private pickNumber(question: Question, healthStatus: HealthStatus): number {
    const min = Math.ceil(question.min ?? DEFAULT_NUMBER_MIN);
    const max = Math.floor(question.max ?? DEFAULT_NUMBER_MAX);
    if (max <= min) return question.min ?? DEFAULT_NUMBER_MIN;
    if (healthStatus === 'normal') {
      return this.random.int(min, max);
    }
    const midpoint = Math.ceil((min + max) / 2);
    return this.random.int(midpoint, max);
  }
}
