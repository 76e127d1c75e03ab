/**
 * Generation run configuration
 *
 * Built once at startup from CLI flags, environment variables and an
 * optional .env file, then passed read-only to every component.
 *
 * Environment variables:
 * - OPENAI_API_KEY: model credential (flag > env > .env > none)
 *
 * Without a credential every answer comes from the rule-based provider.
 */

import * as fs from 'fs';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_MAX_LAB_TESTS_PER_PATIENT } from './data/labTestTriggers';
import { ConfigError } from './errors';
import { DEFAULT_STATUS_DISTRIBUTION, type StatusDistribution } from './services/healthStatusSampler';
import { randomSeed } from './utils/random';

export const OUTPUT_FILE_NAME = 'generated_patient_data.json';
export const API_KEY_ENV_VAR = 'OPENAI_API_KEY';

export const DEFAULTS = {
  questionnairePath: 'json/combined_questionnaires_glossary.json',
  labTestPath: 'json/combined_lab_tests_glossary.json',
  numPatients: 5,
  model: 'gpt-4o-mini',
  outputDir: 'output',
  requestTimeoutMs: 30000,
  maxLabTestsPerPatient: DEFAULT_MAX_LAB_TESTS_PER_PATIENT,
  envFile: '.env',
  profileOutputDir: 'patient_profiles',
} as const;

export type ApiKeySource = 'flag' | 'env' | 'dotenv' | 'none';

export interface GenerationRun {
  readonly questionnairePath: string;
  readonly labTestPath: string;
  readonly numPatients: number;
  readonly apiKey?: string;
  readonly apiKeySource: ApiKeySource;
  readonly model: string;
  readonly outputDir: string;
  readonly outputFileName: string;
  readonly seed: number;
  readonly requestTimeoutMs: number;
  readonly maxLabTestsPerPatient: number;
  readonly statusDistribution: Readonly<StatusDistribution>;
}

/** Raw option values as the CLI hands them over. */
export interface GenerationRunInput {
  questionnairePath?: string;
  labTestPath?: string;
  numPatients?: string | number;
  apiKey?: string;
  model?: string;
  outputDir?: string;
  seed?: string | number;
  timeoutMs?: string | number;
  maxLabTests?: string | number;
  statusDistribution?: string;
  envFile?: string;
}

const positiveInt = (flag: string) =>
  z.coerce
    .number({ invalid_type_error: `${flag} must be a number` })
    .int(`${flag} must be a whole number`)
    .positive(`${flag} must be greater than zero`);

const nonEmptyPath = (flag: string) => z.string().trim().min(1, `${flag} must not be empty`);

const inputSchema = z.object({
  questionnairePath: nonEmptyPath('--questionnaire_path').default(DEFAULTS.questionnairePath),
  labTestPath: nonEmptyPath('--lab_test_path').default(DEFAULTS.labTestPath),
  numPatients: positiveInt('--num_patients').default(DEFAULTS.numPatients),
  model: z.string().trim().min(1, '--model must not be empty').default(DEFAULTS.model),
  outputDir: nonEmptyPath('--output_dir').default(DEFAULTS.outputDir),
  seed: z.coerce
    .number({ invalid_type_error: '--seed must be a number' })
    .int('--seed must be a whole number')
    .nonnegative('--seed must not be negative')
    .max(0xffffffff, '--seed must be at most 4294967295')
    .optional(),
  timeoutMs: positiveInt('--timeout_ms').default(DEFAULTS.requestTimeoutMs),
  maxLabTests: positiveInt('--max_lab_tests').default(DEFAULTS.maxLabTestsPerPatient),
});

const statusWeightSchema = z.coerce.number().finite().nonnegative();

/**
 * Parse "normal=0.7,low=0.15,high=0.15". Statuses left out get weight 0.
 */
export function parseStatusDistribution(weights: string): StatusDistribution {
  const distribution: StatusDistribution = { normal: 0, low: 0, high: 0 };
  for (const part of weights.split(',').map((entry) => entry.trim()).filter(Boolean)) {
    const [rawStatus, rawWeight] = part.split('=').map((token) => token.trim());
    if (rawStatus !== 'normal' && rawStatus !== 'low' && rawStatus !== 'high') {
      throw new ConfigError(`Unknown health status in --status_distribution: "${rawStatus}"`);
    }
    const weight = statusWeightSchema.safeParse(rawWeight);
    if (!weight.success || rawWeight === undefined || rawWeight === '') {
      throw new ConfigError(`Invalid weight for "${rawStatus}" in --status_distribution: "${rawWeight ?? ''}"`);
    }
    distribution[rawStatus] = weight.data;
  }

  if (distribution.normal + distribution.low + distribution.high <= 0) {
    throw new ConfigError('--status_distribution must give at least one status a positive weight');
  }
  return distribution;
}

const readDotenvKey = (envFile: string): string | undefined => {
  let contents: string;
  try {
    contents = fs.readFileSync(envFile, 'utf-8');
  } catch {
    // A missing .env file just means no entry
    return undefined;
  }
  return dotenv.parse(contents)[API_KEY_ENV_VAR];
};

const nonBlank = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export function resolveApiKey(
  flagValue: string | undefined,
  env: NodeJS.ProcessEnv,
  envFile: string,
): { apiKey?: string; source: ApiKeySource } {
  const fromFlag = nonBlank(flagValue);
  if (fromFlag) return { apiKey: fromFlag, source: 'flag' };

  const fromEnv = nonBlank(env[API_KEY_ENV_VAR]);
  if (fromEnv) return { apiKey: fromEnv, source: 'env' };

  const fromDotenv = nonBlank(readDotenvKey(envFile));
  if (fromDotenv) return { apiKey: fromDotenv, source: 'dotenv' };

  return { source: 'none' };
}

export function buildGenerationRun(
  input: GenerationRunInput,
  env: NodeJS.ProcessEnv = process.env,
): GenerationRun {
  const parsed = inputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }

  const options = parsed.data;
  const { apiKey, source } = resolveApiKey(input.apiKey, env, input.envFile ?? DEFAULTS.envFile);
  const statusDistribution = input.statusDistribution
    ? parseStatusDistribution(input.statusDistribution)
    : { ...DEFAULT_STATUS_DISTRIBUTION };

  return Object.freeze({
    questionnairePath: options.questionnairePath,
    labTestPath: options.labTestPath,
    numPatients: options.numPatients,
    apiKey,
    apiKeySource: source,
    model: options.model,
    outputDir: options.outputDir,
    outputFileName: OUTPUT_FILE_NAME,
    seed: options.seed ?? randomSeed(),
    requestTimeoutMs: options.timeoutMs,
    maxLabTestsPerPatient: options.maxLabTests,
    statusDistribution: Object.freeze(statusDistribution),
  });
}

export interface ProfileRun {
  readonly questionnairePath: string;
  readonly labTestPath: string;
  readonly numProfiles: number;
  readonly apiKey: string;
  readonly apiKeySource: Exclude<ApiKeySource, 'none'>;
  readonly model: string;
  readonly outputDir: string;
  readonly requestTimeoutMs: number;
}

export interface ProfileRunInput {
  questionnairePath?: string;
  labTestPath?: string;
  numProfiles?: string | number;
  apiKey?: string;
  model?: string;
  outputDir?: string;
  timeoutMs?: string | number;
  envFile?: string;
}

const profileInputSchema = z.object({
  questionnairePath: nonEmptyPath('--questionnaire_path').default(DEFAULTS.questionnairePath),
  labTestPath: nonEmptyPath('--lab_test_path').default(DEFAULTS.labTestPath),
  numProfiles: positiveInt('--num_profiles'),
  model: z.string().trim().min(1, '--model must not be empty').default(DEFAULTS.model),
  outputDir: nonEmptyPath('--output_dir').default(DEFAULTS.profileOutputDir),
  timeoutMs: positiveInt('--timeout_ms').default(DEFAULTS.requestTimeoutMs),
});

/**
 * Configuration for narrative profile generation. Profiles are written by
 * the model alone, so a credential is required.
 */
export function buildProfileRun(input: ProfileRunInput, env: NodeJS.ProcessEnv = process.env): ProfileRun {
  const parsed = profileInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }

  const { apiKey, source } = resolveApiKey(input.apiKey, env, input.envFile ?? DEFAULTS.envFile);
  if (!apiKey || source === 'none') {
    throw new ConfigError(`OpenAI API key not provided. Use --api_key or set ${API_KEY_ENV_VAR}`);
  }

  const options = parsed.data;
  return Object.freeze({
    questionnairePath: options.questionnairePath,
    labTestPath: options.labTestPath,
    numProfiles: options.numProfiles,
    apiKey,
    apiKeySource: source,
    model: options.model,
    outputDir: options.outputDir,
    requestTimeoutMs: options.timeoutMs,
  });
}
