import * as fs from 'fs/promises';
import * as logger from 'firebase-functions/logger';
import type { z } from 'zod';
import { ConfigError, NotFoundError, ParseError, describeError } from '../errors';
import {
  labTestGlossarySchema,
  questionnaireGlossarySchema,
  type KeyedForm,
  type LabTestGlossary,
  type QuestionnaireGlossary,
} from '../types/glossary';

const isMissingFileError = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  (error.code === 'ENOENT' || error.code === 'ENOTDIR');

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');

/**
 * Read a JSON document from disk.
 * Missing files raise NotFoundError, malformed JSON raises ParseError.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new NotFoundError(filePath, 'Glossary file');
    }
    throw new ConfigError(`Unable to read ${filePath}: ${describeError(error)}`, filePath);
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ParseError(filePath, describeError(error));
  }
}

async function loadGlossary<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
  label: string,
): Promise<z.infer<S>> {
  const data = await readJsonFile(filePath);
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(
      `${label} at ${filePath} is missing required structure: ${formatIssues(parsed.error)}`,
      filePath,
    );
  }
  return parsed.data;
}

export async function loadQuestionnaireGlossary(filePath: string): Promise<QuestionnaireGlossary> {
  const glossary = await loadGlossary(filePath, questionnaireGlossarySchema, 'Questionnaire glossary');
  logger.info('[GlossaryLoader] Loaded questionnaire glossary', {
    path: filePath,
    forms: Object.keys(glossary.questionsGlossary.byForm).length,
  });
  return glossary;
}

export async function loadLabTestGlossary(filePath: string): Promise<LabTestGlossary> {
  const glossary = await loadGlossary(filePath, labTestGlossarySchema, 'Lab test glossary');
  logger.info('[GlossaryLoader] Loaded lab test glossary', {
    path: filePath,
    tests: glossary.testsGlossary.allTests.length,
  });
  return glossary;
}

export const listForms = (glossary: QuestionnaireGlossary): KeyedForm[] =>
  Object.entries(glossary.questionsGlossary.byForm).map(([formKey, form]) => ({
    formKey,
    form,
  }));
