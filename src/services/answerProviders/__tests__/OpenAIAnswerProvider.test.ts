import { AxiosError, AxiosHeaders } from 'axios';
import { ApiError } from '../../../errors';
import type { Question } from '../../../types/glossary';
import type { AnswerRequest } from '../AnswerProvider';
import { OpenAIAnswerProvider, buildFormPrompt } from '../OpenAIAnswerProvider';

const questions: Question[] = [
    { id: 'energy', text: 'How is your energy?', type: 'multiple_choice', options: ['Good', 'Poor'] },
    { id: 'notes', text: 'Anything else?', type: 'text' },
];

const request: AnswerRequest = {
    formKey: 'intake',
    form: { formTitle: 'General Intake', questions },
    questions,
    healthStatus: 'low',
    patientId: 'PAT_0003',
};

const replyWith = (content: string | null) => ({
    data: { choices: [{ message: { content } }] },
});

describe('OpenAIAnswerProvider', () => {
    it('requires an API key', () => {
        expect(() => new OpenAIAnswerProvider('', 'gpt-4o-mini')).toThrow('OpenAI API key is not configured');
    });

    it('posts one chat completion per form and returns coerced answers', async () => {
        const post = jest.fn().mockResolvedValue(
            replyWith('```json\n{"answers": {"energy": "poor", "notes": "Feeling drained"}}\n```'),
        );
        const provider = new OpenAIAnswerProvider('test-key', 'gpt-4o-mini', { client: { post } });

        const answers = await provider.answerForm(request);

        expect(answers).toEqual({ energy: 'Poor', notes: 'Feeling drained' });
        expect(post).toHaveBeenCalledTimes(1);
        const [url, body] = post.mock.calls[0];
        expect(url).toBe('/chat/completions');
        expect(body).toMatchObject({
            model: 'gpt-4o-mini',
            response_format: { type: 'json_object' },
        });
        expect(body.messages[1].content).toBe(buildFormPrompt(request));
    });

    it('embeds the form, status and question choices in the prompt', () => {
        const prompt = buildFormPrompt(request);
        expect(prompt).toContain('Form: General Intake');
        expect(prompt).toContain('Target health status: low');
        expect(prompt).toContain('- id: energy');
        expect(prompt).toContain('  options: Good | Poor');
    });

    it('skips the call when there is nothing to answer', async () => {
        const post = jest.fn();
        const provider = new OpenAIAnswerProvider('test-key', 'gpt-4o-mini', { client: { post } });

        await expect(provider.answerForm({ ...request, questions: [] })).resolves.toEqual({});
        expect(post).not.toHaveBeenCalled();
    });

    it('wraps HTTP failures in ApiError with the status', async () => {
        const failure = new AxiosError('Request failed', 'ERR_BAD_REQUEST');
        failure.response = {
            status: 429,
            statusText: 'Too Many Requests',
            data: {},
            headers: {},
            config: { headers: new AxiosHeaders() },
        };
        const post = jest.fn().mockRejectedValue(failure);
        const provider = new OpenAIAnswerProvider('test-key', 'gpt-4o-mini', { client: { post } });

        const error = await provider.answerForm(request).catch((caught: unknown) => caught);
        expect(error).toBeInstanceOf(ApiError);
        expect(error).toMatchObject({ status: 429, message: 'Model request failed with status 429' });
    });

    it('reports timeouts as ApiError', async () => {
        const post = jest.fn().mockRejectedValue(new AxiosError('timeout of 10ms exceeded', 'ECONNABORTED'));
        const provider = new OpenAIAnswerProvider('test-key', 'gpt-4o-mini', { client: { post } });

        await expect(provider.answerForm(request)).rejects.toThrow('Model request timed out');
    });

    it('reports empty and unparseable replies as ApiError', async () => {
        const post = jest
            .fn()
            .mockResolvedValueOnce(replyWith(null))
            .mockResolvedValueOnce(replyWith('I would rather not answer.'));
        const provider = new OpenAIAnswerProvider('test-key', 'gpt-4o-mini', { client: { post } });

        await expect(provider.answerForm(request)).rejects.toThrow('Model returned an empty reply');
        await expect(provider.answerForm(request)).rejects.toThrow('Model returned an invalid JSON response');
    });
});
