import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildProfileRun } from '../../config';
import { ApiError, NotFoundError } from '../../errors';
import { formatProfileFileName, nextProfileNumber, ProfileRunner } from '../profileRunner';

describe('ProfileRunner', () => {
    let dir: string;
    let outputDir: string;

    const repoJson = (name: string): string => path.resolve(__dirname, '..', '..', '..', 'json', name);

    const makeRun = (numProfiles: number, questionnairePath = repoJson('combined_questionnaires_glossary.json')) =>
        buildProfileRun(
            {
                numProfiles,
                questionnairePath,
                labTestPath: repoJson('combined_lab_tests_glossary.json'),
                outputDir,
                envFile: path.join(dir, 'missing.env'),
            },
            { OPENAI_API_KEY: 'test-key' },
        );

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'profiles-'));
        outputDir = path.join(dir, 'profiles');
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('formats profile file names with at least two digits', () => {
        expect(formatProfileFileName(3)).toBe('patient_profile_03.md');
        expect(formatProfileFileName(120)).toBe('patient_profile_120.md');
    });

    it('continues numbering after existing profiles', async () => {
        expect(await nextProfileNumber(outputDir)).toBe(1);

        fs.mkdirSync(outputDir);
        fs.writeFileSync(path.join(outputDir, 'patient_profile_02.md'), '');
        fs.writeFileSync(path.join(outputDir, 'patient_profile_07.md'), '');
        fs.writeFileSync(path.join(outputDir, 'notes.md'), '');

        expect(await nextProfileNumber(outputDir)).toBe(8);
    });

    it('writes one Markdown file per profile', async () => {
        const generate = jest
            .fn()
            .mockResolvedValueOnce('### *Patient Profile: First*')
            .mockResolvedValueOnce('### *Patient Profile: Second*');
        const onProfileWritten = jest.fn();

        const summary = await new ProfileRunner(makeRun(2), { generator: { generate }, onProfileWritten }).execute();

        const first = path.join(outputDir, 'patient_profile_01.md');
        const second = path.join(outputDir, 'patient_profile_02.md');
        expect(summary).toEqual({ requested: 2, writtenPaths: [first, second], failedProfileNumbers: [], outputDir });
        expect(fs.readFileSync(first, 'utf-8')).toBe('### *Patient Profile: First*\n');
        expect(fs.readFileSync(second, 'utf-8')).toBe('### *Patient Profile: Second*\n');
        expect(onProfileWritten).toHaveBeenCalledWith(second, 2);
        expect(generate.mock.calls[0][0]).toMatchObject({ totalForms: 3, totalTests: 33 });
    });

    it('skips a profile the model fails to produce', async () => {
        fs.mkdirSync(outputDir);
        fs.writeFileSync(path.join(outputDir, 'patient_profile_04.md'), 'existing');
        const generate = jest
            .fn()
            .mockRejectedValueOnce(new ApiError('Model request failed with status 500', { status: 500 }))
            .mockResolvedValueOnce('### *Patient Profile: Later*');

        const summary = await new ProfileRunner(makeRun(2), { generator: { generate } }).execute();

        expect(summary.failedProfileNumbers).toEqual([5]);
        expect(summary.writtenPaths).toEqual([path.join(outputDir, 'patient_profile_06.md')]);
        expect(fs.existsSync(path.join(outputDir, 'patient_profile_05.md'))).toBe(false);
        expect(fs.readFileSync(path.join(outputDir, 'patient_profile_04.md'), 'utf-8')).toBe('existing');
    });

    it('propagates errors that are not model failures', async () => {
        const generate = jest.fn().mockRejectedValue(new TypeError('bug'));

        await expect(new ProfileRunner(makeRun(1), { generator: { generate } }).execute()).rejects.toThrow(TypeError);
    });

    it('fails before calling the model when a glossary is missing', async () => {
        const generate = jest.fn();
        const runner = new ProfileRunner(makeRun(1, path.join(dir, 'absent.json')), { generator: { generate } });

        await expect(runner.execute()).rejects.toBeInstanceOf(NotFoundError);
        expect(generate).not.toHaveBeenCalled();
        expect(fs.existsSync(outputDir)).toBe(false);
    });
});
