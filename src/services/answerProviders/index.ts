import type { GenerationRun } from '../../config';
import type { RandomSource } from '../../utils/random';
import type { AnswerProvider } from './AnswerProvider';
import { FallbackAnswerProvider } from './FallbackAnswerProvider';
import { OpenAIAnswerProvider } from './OpenAIAnswerProvider';
import { RuleBasedAnswerProvider } from './RuleBasedAnswerProvider';

export type { AnswerProvider, AnswerRequest } from './AnswerProvider';
export { FallbackAnswerProvider, OpenAIAnswerProvider, RuleBasedAnswerProvider };

/**
 * The model provider backed by rules when a credential is configured,
 * the rule-based provider alone otherwise.
 */
export function createAnswerProvider(run: GenerationRun, random: RandomSource): AnswerProvider {
  const rules = new RuleBasedAnswerProvider(random);
  if (!run.apiKey) {
    return rules;
  }

  const remote = new OpenAIAnswerProvider(run.apiKey, run.model, {
    timeoutMs: run.requestTimeoutMs,
  });
  return new FallbackAnswerProvider(remote, rules);
}
