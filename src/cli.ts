#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { API_KEY_ENV_VAR, DEFAULTS, buildGenerationRun, type GenerationRun } from './config';
import { describeError, isFatalError } from './errors';
import { createAnswerProvider } from './services/answerProviders';
import { BatchRunner, type BatchRunSummary } from './services/batchRunner';
import { createRandomSource } from './utils/random';

const DIVIDER = '-'.repeat(60);

type CliOptions = {
  questionnaire_path?: string;
  lab_test_path?: string;
  num_patients?: string;
  api_key?: string;
  model?: string;
  output_dir?: string;
  seed?: string;
  timeout_ms?: string;
  max_lab_tests?: string;
  status_distribution?: string;
  env_file?: string;
};

export function createProgram(): Command {
  return new Command()
    .name('synthetic-patients')
    .description('Generate synthetic questionnaire responses and lab test results for test patients')
    .option('--questionnaire_path <path>', 'path to the questionnaire glossary JSON', DEFAULTS.questionnairePath)
    .option('--lab_test_path <path>', 'path to the lab test glossary JSON', DEFAULTS.labTestPath)
    .option('--num_patients <n>', 'number of patients to generate', String(DEFAULTS.numPatients))
    .option('--api_key <key>', `OpenAI API key (or set ${API_KEY_ENV_VAR})`)
    .option('--model <name>', 'OpenAI model to use', DEFAULTS.model)
    .option('--output_dir <dir>', 'directory for generated_patient_data.json', DEFAULTS.outputDir)
    .option('--seed <n>', 'seed for reproducible runs')
    .option('--timeout_ms <n>', 'timeout for each model request', String(DEFAULTS.requestTimeoutMs))
    .option('--max_lab_tests <n>', 'maximum lab results per patient', String(DEFAULTS.maxLabTestsPerPatient))
    .option('--status_distribution <weights>', 'health status weights, e.g. normal=0.7,low=0.15,high=0.15')
    .option('--env_file <path>', `.env file consulted for ${API_KEY_ENV_VAR}`, DEFAULTS.envFile)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => process.stdout.write(text),
      writeErr: (text) => process.stderr.write(text),
    });
}

const toGenerationRun = (options: CliOptions, env: NodeJS.ProcessEnv): GenerationRun =>
  buildGenerationRun(
    {
      questionnairePath: options.questionnaire_path,
      labTestPath: options.lab_test_path,
      numPatients: options.num_patients,
      apiKey: options.api_key,
      model: options.model,
      outputDir: options.output_dir,
      seed: options.seed,
      timeoutMs: options.timeout_ms,
      maxLabTests: options.max_lab_tests,
      statusDistribution: options.status_distribution,
      envFile: options.env_file,
    },
    env,
  );

const printSummary = (summary: BatchRunSummary): void => {
  console.log(DIVIDER);
  console.log(`✓ Generated data for ${summary.generated} of ${summary.requested} patients`);
  if (summary.skippedPatientIds.length > 0) {
    console.log(`✗ Skipped: ${summary.skippedPatientIds.join(', ')}`);
  }
  console.log(`✓ Saved to: ${summary.outputPath}`);
  console.log('\nSummary:');
  console.log(`  Total patients: ${summary.generated}`);
  console.log(`  Total questionnaire forms: ${summary.totalForms}`);
  console.log(`  Total lab test results: ${summary.totalLabTests}`);
  const average = summary.generated > 0 ? summary.totalLabTests / summary.generated : 0;
  console.log(`  Average lab tests per patient: ${average.toFixed(1)}`);
};

/**
 * Run the generator with the given argv. Resolves to the process exit code.
 */
export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const program = createProgram();
  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  try {
    const run = toGenerationRun(program.opts<CliOptions>(), env);

    console.log('='.repeat(60));
    console.log('Synthetic Patient Data Generator');
    console.log('='.repeat(60));
    if (run.apiKey) {
      console.log(`✓ Using model ${run.model} (API key from ${run.apiKeySource})`);
    } else {
      console.log('Notice: no OpenAI API key configured; all answers will use rule-based generation');
    }
    console.log(`Generating data for ${run.numPatients} patients (seed ${run.seed})...`);

    const random = createRandomSource(run.seed);
    const runner = new BatchRunner(run, {
      answerProvider: createAnswerProvider(run, random),
      random,
      onPatientGenerated: (record, index) =>
        console.log(`  [${index}/${run.numPatients}] ${record.patientId} (status: ${record.healthStatus})`),
    });

    printSummary(await runner.execute());
    return 0;
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    if (!isFatalError(error) && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv)
    .then((code) => {
      process.exit(code);
    })
    .catch((error) => {
      console.error('Synthetic patient generation failed:', error);
      process.exit(1);
    });
}
