#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { API_KEY_ENV_VAR, DEFAULTS, buildProfileRun } from './config';
import { describeError, isFatalError } from './errors';
import { type ChatClient, createOpenAIClient } from './services/openai/client';
import { ProfileGenerator } from './services/profileGenerator';
import { ProfileRunner } from './services/profileRunner';

type ProfileCliOptions = {
  num_profiles?: string;
  questionnaire_path?: string;
  lab_test_path?: string;
  api_key?: string;
  model?: string;
  output_dir?: string;
  timeout_ms?: string;
  env_file?: string;
};

export type ProfileCliDeps = {
  createClient?: (apiKey: string, timeoutMs: number) => ChatClient;
};

export function createProfileProgram(): Command {
  return new Command()
    .name('synthetic-profiles')
    .description('Generate narrative Markdown patient profiles with the OpenAI API')
    .requiredOption('--num_profiles <n>', 'number of profiles to generate')
    .option('--questionnaire_path <path>', 'path to the questionnaire glossary JSON', DEFAULTS.questionnairePath)
    .option('--lab_test_path <path>', 'path to the lab test glossary JSON', DEFAULTS.labTestPath)
    .option('--api_key <key>', `OpenAI API key (or set ${API_KEY_ENV_VAR})`)
    .option('--model <name>', 'OpenAI model to use', DEFAULTS.model)
    .option('--output_dir <dir>', 'directory for patient_profile_NN.md files', DEFAULTS.profileOutputDir)
    .option('--timeout_ms <n>', 'timeout for each model request', String(DEFAULTS.requestTimeoutMs))
    .option('--env_file <path>', `.env file consulted for ${API_KEY_ENV_VAR}`, DEFAULTS.envFile)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => process.stdout.write(text),
      writeErr: (text) => process.stderr.write(text),
    });
}

/**
 * Run profile generation with the given argv. Resolves to the process exit code.
 */
export async function runProfileCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  deps: ProfileCliDeps = {},
): Promise<number> {
  const program = createProfileProgram();
  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  try {
    const options = program.opts<ProfileCliOptions>();
    const run = buildProfileRun(
      {
        numProfiles: options.num_profiles,
        questionnairePath: options.questionnaire_path,
        labTestPath: options.lab_test_path,
        apiKey: options.api_key,
        model: options.model,
        outputDir: options.output_dir,
        timeoutMs: options.timeout_ms,
        envFile: options.env_file,
      },
      env,
    );

    const client = (deps.createClient ?? createOpenAIClient)(run.apiKey, run.requestTimeoutMs);
    console.log(`Generating ${run.numProfiles} patient profile(s) with ${run.model}...`);
    console.log('-'.repeat(50));

    const summary = await new ProfileRunner(run, {
      generator: new ProfileGenerator(client, run.model),
      onProfileWritten: (filePath, index) => console.log(`  [${index}/${run.numProfiles}] ✓ Saved to ${filePath}`),
    }).execute();

    console.log('-'.repeat(50));
    summary.failedProfileNumbers.forEach((profileNumber) =>
      console.log(`  ✗ Failed to generate profile ${profileNumber}`),
    );
    console.log(
      `✓ Completed: ${summary.writtenPaths.length} of ${summary.requested} profile(s) written to ${summary.outputDir}`,
    );
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
  runProfileCli(process.argv)
    .then((code) => {
      process.exit(code);
    })
    .catch((error) => {
      console.error('Patient profile generation failed:', error);
      process.exit(1);
    });
}
