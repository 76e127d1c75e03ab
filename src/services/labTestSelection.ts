import {
  DEFAULT_LAB_TEST_GROUPS,
  DEFAULT_MAX_LAB_TESTS_PER_PATIENT,
  LAB_TEST_TRIGGERS,
} from '../data/labTestTriggers';
import type { LabTestDefinition } from '../types/glossary';
import type { QuestionnaireResponses } from '../types/patient';
import type { RandomSource } from '../utils/random';

const flattenResponses = (responses: QuestionnaireResponses): string =>
  Object.values(responses)
    .flatMap((answers) => Object.values(answers))
    .map((answer) => (typeof answer === 'string' ? answer : JSON.stringify(answer)))
    .join(' ')
    .toLowerCase();

/**
 * Test groups relevant to a patient: the default panel plus every group
 * whose trigger keywords appear in the questionnaire answers.
 */
export function selectRelevantTestGroups(responses: QuestionnaireResponses): string[] {
  const text = flattenResponses(responses);
  const groups = new Set<string>(DEFAULT_LAB_TEST_GROUPS);

  for (const trigger of LAB_TEST_TRIGGERS) {
    if (trigger.keywords.some((keyword) => text.includes(keyword))) {
      trigger.groups.forEach((group) => groups.add(group));
    }
  }

  return [...groups];
}

export interface SelectLabTestsOptions {
  groups: readonly string[];
  random: RandomSource;
  maxTests?: number;
}

/**
 * Glossary tests belonging to `groups`, in glossary order. Falls back to the
 * whole glossary when none match, and samples down to `maxTests`.
 */
export function selectLabTests(
  allTests: readonly LabTestDefinition[],
  { groups, random, maxTests = DEFAULT_MAX_LAB_TESTS_PER_PATIENT }: SelectLabTestsOptions,
): LabTestDefinition[] {
  const wanted = new Set(groups);
  const matching = allTests.filter((test) => wanted.has(test.testGroupName));
  const eligible = matching.length > 0 ? matching : [...allTests];

  return eligible.length > maxTests ? random.sample(eligible, maxTests) : eligible;
}
