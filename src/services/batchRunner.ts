/**
 * Batch Runner
 *
 * Drives a generation run: loads both glossaries, generates each patient in
 * turn, and writes the collected records as one JSON array.
 *
 * ConfigError and WriteError fail the run. Any other per-patient error is
 * logged and that patient is skipped.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as logger from 'firebase-functions/logger';
import type { GenerationRun } from '../config';
import { ConfigError, WriteError, describeError } from '../errors';
import type { LabTestGlossary, QuestionnaireGlossary } from '../types/glossary';
import type { PatientRecord, QuestionnaireResponses } from '../types/patient';
import type { RandomSource } from '../utils/random';
import type { AnswerProvider } from './answerProviders/AnswerProvider';
import { type BatchRunState, assertTransition, formatPatientId, isTerminalState } from './batchRunTransitions';
import { listForms, loadLabTestGlossary, loadQuestionnaireGlossary } from './glossaryLoader';
import { HealthStatusSampler } from './healthStatusSampler';
import { selectLabTests, selectRelevantTestGroups } from './labTestSelection';
import { LabValueGenerator } from './labValueGenerator';
import { assemblePatientRecord } from './patientRecordAssembler';
import { ResponseGenerator } from './responseGenerator';

export type BatchRunnerDeps = {
  answerProvider: AnswerProvider;
  random: RandomSource;
  clock?: () => Date;
  onPatientGenerated?: (record: Readonly<PatientRecord>, index: number) => void;
};

export interface BatchRunSummary {
  state: BatchRunState;
  requested: number;
  generated: number;
  skippedPatientIds: string[];
  totalForms: number;
  totalLabTests: number;
  outputPath: string;
}

export class BatchRunner {
  private state: BatchRunState = 'idle';
  private readonly clock: () => Date;
  private readonly responses: ResponseGenerator;
  private readonly labValues: LabValueGenerator;
  private readonly sampler: HealthStatusSampler;

  constructor(
    private readonly run: GenerationRun,
    private readonly deps: BatchRunnerDeps,
  ) {
    this.clock = deps.clock ?? (() => new Date());
    this.responses = new ResponseGenerator(deps.answerProvider);
    this.labValues = new LabValueGenerator(deps.random);
    this.sampler = new HealthStatusSampler(deps.random, run.statusDistribution);
  }

  getState(): BatchRunState {
    return this.state;
  }

  get outputPath(): string {
    return path.join(this.run.outputDir, this.run.outputFileName);
  }

  async execute(): Promise<BatchRunSummary> {
    try {
      this.transition('loading');
      const questionnaires = await loadQuestionnaireGlossary(this.run.questionnairePath);
      const labTests = await loadLabTestGlossary(this.run.labTestPath);

      this.transition('generating');
      const { records, skippedPatientIds } = await this.generatePatients(questionnaires, labTests);

      this.transition('aggregating');
      const summary: BatchRunSummary = {
        state: this.state,
        requested: this.run.numPatients,
        generated: records.length,
        skippedPatientIds,
        totalForms: records.reduce((sum, record) => sum + record.metadata.totalForms, 0),
        totalLabTests: records.reduce((sum, record) => sum + record.metadata.totalLabTests, 0),
        outputPath: this.outputPath,
      };

      this.transition('writing');
      await this.writeOutput(records);

      this.transition('done');
      logger.info('[BatchRunner] Run complete', {
        generated: summary.generated,
        skipped: skippedPatientIds.length,
        outputPath: summary.outputPath,
      });
      return { ...summary, state: this.state };
    } catch (error) {
      if (!isTerminalState(this.state)) {
        this.transition('failed');
      }
      logger.error('[BatchRunner] Run failed', { error: describeError(error) });
      throw error;
    }
  }

  private transition(next: BatchRunState): void {
    this.state = assertTransition(this.state, next);
  }

  private async generatePatients(
    questionnaires: QuestionnaireGlossary,
    labTests: LabTestGlossary,
  ): Promise<{ records: Array<Readonly<PatientRecord>>; skippedPatientIds: string[] }> {
    const forms = listForms(questionnaires);
    const allTests = labTests.testsGlossary.allTests;
    const records: Array<Readonly<PatientRecord>> = [];
    const skippedPatientIds: string[] = [];

    for (let index = 1; index <= this.run.numPatients; index++) {
      const patientId = formatPatientId(index);
      const healthStatus = this.sampler.next();
      logger.info(`[BatchRunner] Generating ${patientId}`, {
        healthStatus,
        progress: `${index}/${this.run.numPatients}`,
      });

      try {
        const questionnaireResponses: QuestionnaireResponses = {};
        for (const keyedForm of forms) {
          questionnaireResponses[keyedForm.formKey] = await this.responses.generate(
            keyedForm,
            healthStatus,
            patientId,
          );
        }

        const selectedTests = selectLabTests(allTests, {
          groups: selectRelevantTestGroups(questionnaireResponses),
          random: this.deps.random,
          maxTests: this.run.maxLabTestsPerPatient,
        });
        const labTestResults = this.labValues.generate(selectedTests, healthStatus);

        const record = assemblePatientRecord({
          patientId,
          healthStatus,
          questionnaireResponses,
          labTestResults,
          createdAt: this.clock(),
        });
        records.push(record);
        this.deps.onPatientGenerated?.(record, index);
      } catch (error) {
        if (error instanceof ConfigError) {
          throw error;
        }
        logger.warn(`[BatchRunner] Skipping ${patientId}`, { error: describeError(error) });
        skippedPatientIds.push(patientId);
      }
    }

    return { records, skippedPatientIds };
  }

  private async writeOutput(records: ReadonlyArray<Readonly<PatientRecord>>): Promise<void> {
    const outputPath = this.outputPath;
    try {
      await fs.mkdir(this.run.outputDir, { recursive: true });
      await fs.writeFile(outputPath, `${JSON.stringify(records, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new WriteError(outputPath, describeError(error));
    }
  }
}
