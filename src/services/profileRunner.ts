/**
 * Profile Runner
 *
 * Writes one Markdown file per generated profile. Numbering continues
 * after the highest `patient_profile_NN.md` already in the output
 * directory, so repeated runs add profiles instead of replacing them.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as logger from 'firebase-functions/logger';
import type { ProfileRun } from '../config';
import { ApiError, WriteError, describeError } from '../errors';
import { loadLabTestGlossary, loadQuestionnaireGlossary } from './glossaryLoader';
import { type ProfileGenerator, summarizeGlossaries } from './profileGenerator';

const PROFILE_FILE_PATTERN = /^patient_profile_(\d+)\.md$/;

export const formatProfileFileName = (profileNumber: number): string =>
  `patient_profile_${String(profileNumber).padStart(2, '0')}.md`;

/** First unused profile number in `dir` (1 when empty or missing). */
export async function nextProfileNumber(dir: string): Promise<number> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      return 1;
    }
    throw error;
  }

  const numbers = entries
    .map((entry) => PROFILE_FILE_PATTERN.exec(entry))
    .filter((match): match is RegExpExecArray => match !== null)
    .map((match) => Number(match[1]));
  return numbers.length > 0 ? Math.max(...numbers) + 1 : 1;
}

export type ProfileRunnerDeps = {
  generator: Pick<ProfileGenerator, 'generate'>;
  onProfileWritten?: (filePath: string, index: number) => void;
};

export interface ProfileRunSummary {
  requested: number;
  writtenPaths: string[];
  failedProfileNumbers: number[];
  outputDir: string;
}

export class ProfileRunner {
  constructor(
    private readonly run: ProfileRun,
    private readonly deps: ProfileRunnerDeps,
  ) {}

  async execute(): Promise<ProfileRunSummary> {
    const questionnaires = await loadQuestionnaireGlossary(this.run.questionnairePath);
    const labTests = await loadLabTestGlossary(this.run.labTestPath);
    const context = summarizeGlossaries(questionnaires, labTests);

    try {
      await fs.mkdir(this.run.outputDir, { recursive: true });
    } catch (error) {
      throw new WriteError(this.run.outputDir, describeError(error));
    }
    const start = await nextProfileNumber(this.run.outputDir);

    const writtenPaths: string[] = [];
    const failedProfileNumbers: number[] = [];

    for (let index = 1; index <= this.run.numProfiles; index++) {
      const profileNumber = start + index - 1;
      const filePath = path.join(this.run.outputDir, formatProfileFileName(profileNumber));
      logger.info(`[ProfileRunner] Generating profile ${profileNumber}`, {
        progress: `${index}/${this.run.numProfiles}`,
      });

      let content: string;
      try {
        content = await this.deps.generator.generate(context);
      } catch (error) {
        if (!(error instanceof ApiError)) {
          throw error;
        }
        logger.warn(`[ProfileRunner] Profile ${profileNumber} failed`, {
          error: error.message,
          status: error.status,
        });
        failedProfileNumbers.push(profileNumber);
        continue;
      }

      try {
        await fs.writeFile(filePath, `${content}\n`, 'utf-8');
      } catch (error) {
        throw new WriteError(filePath, describeError(error));
      }
      writtenPaths.push(filePath);
      this.deps.onProfileWritten?.(filePath, index);
    }

    logger.info('[ProfileRunner] Run complete', {
      written: writtenPaths.length,
      failed: failedProfileNumbers.length,
      outputDir: this.run.outputDir,
    });
    return {
      requested: this.run.numProfiles,
      writtenPaths,
      failedProfileNumbers,
      outputDir: this.run.outputDir,
    };
  }
}
