/**
 * Patient Profile Generator
 *
 * Asks the model for a narrative Markdown profile of one fictional patient.
 * The prompt is seeded with what the two glossaries cover so the profile
 * mentions lab tests and questionnaire topics the system knows about.
 */

import { ApiError } from '../errors';
import type { LabTestGlossary, QuestionnaireGlossary } from '../types/glossary';
import { type ChatClient, requestChatCompletion } from './openai/client';

const SAMPLE_GROUP_LIMIT = 15;

export const PROFILE_SECTIONS = [
  ['Demographics', 'Age, gender, brief background'],
  ['Chief Complaints', 'Main symptoms and concerns'],
  ['Metabolic Concerns', 'Metabolic issues, if any'],
  ['Hormonal Symptoms', 'Hormonal symptoms, if any'],
  ['Lifestyle & Symptoms', 'Lifestyle factors and related symptoms'],
  ['Dietary Triggers', 'Food sensitivities or dietary issues, if any'],
  ['Lab Profile (Metabolic)', '2-3 metabolic tests with values and reference ranges'],
  ['Lab Profile (Hormonal)', '2-3 hormonal tests with values and reference ranges'],
  ['Lab Profile (Thyroid)', 'Thyroid tests, if relevant'],
  ['Nutritional Status', 'Vitamin and mineral levels, if relevant'],
  ['Inflammatory Markers', 'Inflammatory markers, if relevant'],
  ['Clinical Summary', 'Summary connecting symptoms, lab values and questionnaire findings'],
] as const;

const SYSTEM_PROMPT =
  'You are a medical professional writing detailed, fictional patient profiles for software testing, based on lab tests and questionnaire data.';

export interface ProfileContext {
  /** Distinct lab test groups, in glossary order, capped for the prompt */
  labTestGroups: string[];
  formTitles: string[];
  totalTestGroups: number;
  totalTests: number;
  totalForms: number;
  totalQuestions: number;
}

export function summarizeGlossaries(
  questionnaires: QuestionnaireGlossary,
  labTests: LabTestGlossary,
): ProfileContext {
  const forms = Object.entries(questionnaires.questionsGlossary.byForm);
  const groups = [...new Set(labTests.testsGlossary.allTests.map((test) => test.testGroupName))];

  return {
    labTestGroups: groups.slice(0, SAMPLE_GROUP_LIMIT),
    formTitles: [...new Set(forms.map(([formKey, form]) => form.formTitle || formKey))],
    totalTestGroups: groups.length,
    totalTests: labTests.testsGlossary.allTests.length,
    totalForms: forms.length,
    totalQuestions: forms.reduce((sum, [, form]) => sum + form.questions.length, 0),
  };
}

export const buildProfilePrompt = (context: ProfileContext): string =>
  [
    'Create a realistic patient profile in exactly this Markdown format:',
    '',
    '### *Patient Profile: [Patient Name]*',
    '',
    ...PROFILE_SECTIONS.flatMap(([title, hint]) => [`* *${title}:* [${hint}]`, '']),
    `Available lab test groups (sample): ${context.labTestGroups.join(', ')}`,
    `Questionnaire forms: ${context.formTitles.join(', ')}`,
    `The lab glossary holds ${context.totalTests} tests in ${context.totalTestGroups} groups; ` +
      `the questionnaires hold ${context.totalQuestions} questions in ${context.totalForms} forms.`,
    '',
    'Requirements:',
    '1. A realistic name and an age between 30 and 65',
    '2. A mix of normal and abnormal lab values with units',
    '3. Symptoms that correlate with the lab findings',
    '4. A coherent clinical picture across symptoms, lab values and questionnaire answers',
    '',
    'Write each lab value as: *Test Name* is *value unit* (Ref: range).',
  ].join('\n');

export class ProfileGenerator {
  constructor(
    private readonly client: ChatClient,
    private readonly model: string,
  ) {}

  /** One Markdown profile. Throws ApiError when the model call fails or returns nothing. */
  async generate(context: ProfileContext): Promise<string> {
    const content = await requestChatCompletion(this.client, {
      model: this.model,
      temperature: 0.8,
      max_tokens: 2000,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildProfilePrompt(context) },
      ],
    });

    if (!content) {
      throw new ApiError('Model returned an empty profile');
    }
    return content;
  }
}
