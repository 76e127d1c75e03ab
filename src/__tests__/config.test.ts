import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
    DEFAULTS,
    OUTPUT_FILE_NAME,
    buildGenerationRun,
    buildProfileRun,
    parseStatusDistribution,
    resolveApiKey,
} from '../config';
import { ConfigError } from '../errors';

describe('config', () => {
    let dir: string;
    let envFile: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-'));
        envFile = path.join(dir, '.env');
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe('resolveApiKey', () => {
        it('prefers the flag over the environment and the .env file', () => {
            fs.writeFileSync(envFile, 'OPENAI_API_KEY=dotenv-key\n');
            expect(resolveApiKey('flag-key', { OPENAI_API_KEY: 'env-key' }, envFile)).toEqual({
                apiKey: 'flag-key',
                source: 'flag',
            });
        });

        it('falls back to the environment, then the .env file', () => {
            fs.writeFileSync(envFile, 'OPENAI_API_KEY="dotenv-key"\n');
            expect(resolveApiKey(undefined, { OPENAI_API_KEY: 'env-key' }, envFile)).toEqual({
                apiKey: 'env-key',
                source: 'env',
            });
            expect(resolveApiKey('  ', { OPENAI_API_KEY: '' }, envFile)).toEqual({
                apiKey: 'dotenv-key',
                source: 'dotenv',
            });
        });

        it('reports no key when nothing is configured', () => {
            expect(resolveApiKey(undefined, {}, path.join(dir, 'missing.env'))).toEqual({ source: 'none' });
        });
    });

    describe('parseStatusDistribution', () => {
        it('parses weights and zeroes statuses left out', () => {
            expect(parseStatusDistribution('normal=0.5, high=0.5')).toEqual({ normal: 0.5, low: 0, high: 0.5 });
        });

        it('rejects unknown statuses, bad weights and all-zero weights', () => {
            expect(() => parseStatusDistribution('critical=1')).toThrow(
                'Unknown health status in --status_distribution: "critical"',
            );
            expect(() => parseStatusDistribution('low=abc')).toThrow(
                'Invalid weight for "low" in --status_distribution: "abc"',
            );
            expect(() => parseStatusDistribution('low')).toThrow(ConfigError);
            expect(() => parseStatusDistribution('normal=0,low=0')).toThrow(
                '--status_distribution must give at least one status a positive weight',
            );
        });
    });

    describe('buildGenerationRun', () => {
        it('applies defaults', () => {
            const run = buildGenerationRun({ envFile }, {});

            expect(run).toMatchObject({
                questionnairePath: DEFAULTS.questionnairePath,
                labTestPath: DEFAULTS.labTestPath,
                numPatients: 5,
                model: 'gpt-4o-mini',
                outputDir: 'output',
                outputFileName: OUTPUT_FILE_NAME,
                apiKeySource: 'none',
                requestTimeoutMs: 30000,
                maxLabTestsPerPatient: 20,
                statusDistribution: { normal: 0.7, low: 0.15, high: 0.15 },
            });
            expect(run.apiKey).toBeUndefined();
            expect(Number.isInteger(run.seed)).toBe(true);
            expect(Object.isFrozen(run)).toBe(true);
        });

        it('coerces string flag values', () => {
            const run = buildGenerationRun(
                { numPatients: '12', seed: '99', timeoutMs: '500', maxLabTests: '4', envFile },
                { OPENAI_API_KEY: 'test-key' },
            );

            expect(run.numPatients).toBe(12);
            expect(run.seed).toBe(99);
            expect(run.requestTimeoutMs).toBe(500);
            expect(run.maxLabTestsPerPatient).toBe(4);
            expect(run.apiKey).toBe('test-key');
            expect(run.apiKeySource).toBe('env');
        });

        it.each([
            ['0', '--num_patients must be greater than zero'],
            ['-3', '--num_patients must be greater than zero'],
            ['2.5', '--num_patients must be a whole number'],
            ['many', '--num_patients must be a number'],
        ])('rejects --num_patients %s', (numPatients, message) => {
            expect(() => buildGenerationRun({ numPatients, envFile }, {})).toThrow(message);
        });

        it('accepts seeds up to 2^32 - 1 and rejects larger ones', () => {
            expect(buildGenerationRun({ seed: '4294967295', envFile }, {}).seed).toBe(4294967295);
            expect(() => buildGenerationRun({ seed: '4294967296', envFile }, {})).toThrow(
                '--seed must be at most 4294967295',
            );
        });

        it('rejects an empty model name', () => {
            expect(() => buildGenerationRun({ model: '  ', envFile }, {})).toThrow('--model must not be empty');
        });
    });

    describe('buildProfileRun', () => {
        it('requires an API key', () => {
            expect(() => buildProfileRun({ numProfiles: 2, envFile }, {})).toThrow(
                'OpenAI API key not provided. Use --api_key or set OPENAI_API_KEY',
            );
        });

        it('applies profile defaults and coerces the count', () => {
            fs.writeFileSync(envFile, 'OPENAI_API_KEY=test-key\n');

            const run = buildProfileRun({ numProfiles: '3', envFile }, {});

            expect(run).toEqual({
                questionnairePath: DEFAULTS.questionnairePath,
                labTestPath: DEFAULTS.labTestPath,
                numProfiles: 3,
                apiKey: 'test-key',
                apiKeySource: 'dotenv',
                model: 'gpt-4o-mini',
                outputDir: 'patient_profiles',
                requestTimeoutMs: 30000,
            });
        });

        it('rejects a missing or non-positive count', () => {
            expect(() => buildProfileRun({ envFile }, { OPENAI_API_KEY: 'test-key' })).toThrow(
                '--num_profiles must be a number',
            );
            expect(() => buildProfileRun({ numProfiles: 0, envFile }, { OPENAI_API_KEY: 'test-key' })).toThrow(
                '--num_profiles must be greater than zero',
            );
        });
    });
});
