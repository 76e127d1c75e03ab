/**
 * Glossary Type Definitions
 *
 * Shapes of the two reference documents a generation run reads:
 * the questionnaire glossary and the lab-test glossary.
 */

import { z } from 'zod';

// =============================================================================
// Questionnaire Glossary
// =============================================================================

export const QUESTION_TYPES = [
  'text',
  'multiple_choice',
  'checkbox',
  'multiple_choice_grid',
  'number',
] as const;

export type QuestionType = (typeof QUESTION_TYPES)[number];

export const questionSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    text: z.string().default(''),
    // Unknown or missing types are answered as free text
    type: z.enum(QUESTION_TYPES).catch('text'),
    options: z.array(z.string()).optional(),
    rows: z.array(z.string()).optional(),
    columns: z.array(z.string()).optional(),
    placeholder: z.string().optional(),
    min: z.number().optional(),
    max: z.number().optional(),
  })
  .passthrough();

export const questionnaireFormSchema = z
  .object({
    formTitle: z.string().default(''),
    questions: z.array(questionSchema).default([]),
  })
  .passthrough();

export const questionnaireGlossarySchema = z
  .object({
    metadata: z
      .object({
        totalForms: z.number().optional(),
        totalQuestions: z.number().optional(),
      })
      .passthrough()
      .optional(),
    questionsGlossary: z
      .object({
        byForm: z.record(z.string(), questionnaireFormSchema),
      })
      .passthrough(),
  })
  .passthrough();

export type Question = z.infer<typeof questionSchema>;
export type QuestionnaireForm = z.infer<typeof questionnaireFormSchema>;
export type QuestionnaireGlossary = z.infer<typeof questionnaireGlossarySchema>;

/** A form together with the key it is filed under in the glossary. */
export interface KeyedForm {
  formKey: string;
  form: QuestionnaireForm;
}

// =============================================================================
// Lab Test Glossary
// =============================================================================

export const labTestDefinitionSchema = z
  .object({
    testGroupName: z.string(),
    testAttributeName: z.string(),
    unit: z.string().default(''),
    minRange: z.number().nullable().optional(),
    maxRange: z.number().nullable().optional(),
  })
  .passthrough();

export const labTestGlossarySchema = z
  .object({
    metadata: z
      .object({
        totalTestGroups: z.number().optional(),
        totalTests: z.number().optional(),
      })
      .passthrough()
      .optional(),
    testsGlossary: z
      .object({
        allTests: z.array(labTestDefinitionSchema),
      })
      .passthrough(),
  })
  .passthrough();

export type LabTestDefinition = z.infer<typeof labTestDefinitionSchema>;
export type LabTestGlossary = z.infer<typeof labTestGlossarySchema>;
