import * as logger from 'firebase-functions/logger';
import { ApiError } from '../../errors';
import type { Question } from '../../types/glossary';
import type { FormAnswers, HealthStatus } from '../../types/patient';
import { type ChatClient, createOpenAIClient, requestChatCompletion } from '../openai/client';
import { parseFormReply } from '../openai/replyParser';
import type { AnswerProvider, AnswerRequest } from './AnswerProvider';

export interface OpenAIAnswerProviderOptions {
  timeoutMs?: number;
  /** Pre-built HTTP client; defaults to an axios instance for the OpenAI API */
  client?: ChatClient;
}

const STATUS_GUIDANCE: Record<HealthStatus, string> = {
  normal: 'The patient is broadly healthy. Answers should mostly report no symptoms or only mild, occasional ones.',
  low:
    'The patient has results below normal reference ranges (e.g. low energy, deficiencies). Answers should reflect relevant symptoms such as fatigue, weakness or low mood.',
  high:
    'The patient has results above normal reference ranges (e.g. elevated glucose, lipids or liver enzymes). Answers should reflect relevant symptoms and risk factors.',
};

const SYSTEM_PROMPT = [
  'You generate realistic synthetic answers to medical intake questionnaires, written as the patient.',
  'Always respond with STRICT JSON (no markdown code fences) of the form {"answers": {"<question id>": <answer>}}.',
  'Answer shapes by question type:',
  '  • text: a concise string (1-2 sentences)',
  '  • multiple_choice: exactly one of the listed options, spelled as listed',
  '  • checkbox: an array of 0-3 of the listed options',
  '  • multiple_choice_grid: an object mapping every row to one of the listed columns',
  '  • number: a number within the stated bounds',
  'Include every question id you are given.',
].join('\n');

const describeQuestion = (question: Question): string => {
  const lines = [`- id: ${question.id}`, `  type: ${question.type}`, `  question: ${question.text}`];
  if (question.options?.length) lines.push(`  options: ${question.options.join(' | ')}`);
  if (question.rows?.length) lines.push(`  rows: ${question.rows.join(' | ')}`);
  if (question.columns?.length) lines.push(`  columns: ${question.columns.join(' | ')}`);
  if (question.placeholder) lines.push(`  hint: ${question.placeholder}`);
  if (question.type === 'number') {
    lines.push(`  bounds: ${question.min ?? 'none'} to ${question.max ?? 'none'}`);
  }
  return lines.join('\n');
};

export const buildFormPrompt = (request: AnswerRequest): string =>
  [
    `Form: ${request.form.formTitle || request.formKey}`,
    `Target health status: ${request.healthStatus}`,
    STATUS_GUIDANCE[request.healthStatus],
    '',
    'Questions:',
    ...request.questions.map(describeQuestion),
    '',
    'Respond with JSON only.',
  ].join('\n');

/**
 * Answers a whole form with one chat-completions call.
 * Every failure surfaces as ApiError.
 */
export class OpenAIAnswerProvider implements AnswerProvider {
  readonly name = 'openai';
  private client: ChatClient;
  private model: string;

  constructor(apiKey: string, model: string, options: OpenAIAnswerProviderOptions = {}) {
    if (!apiKey) {
      throw new ApiError('OpenAI API key is not configured');
    }

    this.model = model || 'gpt-4o-mini';
    this.client = options.client ?? createOpenAIClient(apiKey, options.timeoutMs);
  }

  async answerForm(request: AnswerRequest): Promise<FormAnswers> {
    if (request.questions.length === 0) {
      return {};
    }

    const content = await requestChatCompletion(this.client, {
      model: this.model,
      temperature: 0.7,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildFormPrompt(request) },
      ],
    });

    const answers = parseFormReply(content, request.questions);
    logger.debug('[OpenAI] Form answered', {
      formKey: request.formKey,
      patientId: request.patientId,
      answered: Object.keys(answers).length,
      requested: request.questions.length,
    });
    return answers;
  }
}
