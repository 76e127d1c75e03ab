/**
 * Model Reply Parsing
 *
 * Pulls the JSON payload out of a chat-completions reply and coerces each
 * answer into the shape its question declares. Answers that cannot be
 * coerced are dropped so the rule-based provider can fill them in.
 */

import { ApiError } from '../../errors';
import type { Question } from '../../types/glossary';
import { type AnswerValue, type FormAnswers, type GridAnswer, createFormAnswers } from '../../types/patient';

/**
 * Extract the JSON block from reply content.
 * Handles:
 * - JSON wrapped in code fences (```json ... ```)
 * - Raw JSON objects
 * - JSON with leading text
 */
export const extractJsonBlock = (content: string): string => {
    const codeFenceMatch = content.match(/```(?:json)?([\s\S]*?)```/i);
    if (codeFenceMatch) {
        return codeFenceMatch[1].trim();
    }

    const jsonMatch = content.match(/\{[\s\S]*\}$/);
    if (jsonMatch) {
        return jsonMatch[0];
    }

    return content.trim();
};

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const sanitizeText = (value: unknown): string | undefined => {
    if (typeof value !== 'string') return undefined;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
};

/** Case-insensitive lookup of a reply string among the allowed choices. */
const matchChoice = (value: unknown, choices: readonly string[]): string | undefined => {
    const text = sanitizeText(value);
    if (!text) return undefined;
    const lower = text.toLowerCase();
    return choices.find((choice) => choice.toLowerCase() === lower);
};

const coerceCheckbox = (value: unknown, options: readonly string[]): string[] | undefined => {
    let candidates: unknown[];
    if (Array.isArray(value)) {
        candidates = value;
    } else if (typeof value === 'string') {
        if (value.trim().toLowerCase() === 'none') return [];
        candidates = value.split(',');
    } else {
        return undefined;
    }

    const picked = new Set<string>();
    for (const candidate of candidates) {
        const match = matchChoice(candidate, options);
        if (match) picked.add(match);
    }
    // Keep glossary order
    return options.filter((option) => picked.has(option));
};

const coerceGrid = (value: unknown, question: Question): GridAnswer | undefined => {
    const rows = question.rows ?? [];
    const columns = question.columns ?? [];
    if (!isPlainObject(value)) return undefined;

    const grid: GridAnswer = {};
    for (const row of rows) {
        const column = matchChoice(value[row], columns);
        if (!column) return undefined;
        grid[row] = column;
    }
    return grid;
};

const coerceNumber = (value: unknown, question: Question): number | undefined => {
    const numeric = typeof value === 'string' ? Number(value.trim()) : value;
    if (typeof numeric !== 'number' || !Number.isFinite(numeric)) return undefined;
    if (question.min !== undefined && numeric < question.min) return undefined;
    if (question.max !== undefined && numeric > question.max) return undefined;
    return numeric;
};

/**
 * Coerce a raw reply value into the answer shape of `question`.
 * Returns undefined when the value does not fit.
 */
export function coerceAnswer(question: Question, value: unknown): AnswerValue | undefined {
    switch (question.type) {
        case 'multiple_choice':
            return matchChoice(value, question.options ?? []);
        case 'checkbox':
            return coerceCheckbox(value, question.options ?? []);
        case 'multiple_choice_grid':
            return coerceGrid(value, question);
        case 'number':
            return coerceNumber(value, question);
        case 'text':
            return typeof value === 'number' ? String(value) : sanitizeText(value);
    }
}

/**
 * Parse a reply of the form `{ "answers": { "<questionId>": value } }`.
 * Throws ApiError when the content is empty or not a JSON object; returns
 * only the answers that fit their question.
 */
export function parseFormReply(content: string, questions: readonly Question[]): FormAnswers {
    if (!content.trim()) {
        throw new ApiError('Model returned an empty reply');
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(extractJsonBlock(content));
    } catch (error) {
        throw new ApiError('Model returned an invalid JSON response', { originalError: error });
    }

    if (!isPlainObject(parsed)) {
        throw new ApiError('Model reply is not a JSON object');
    }

    const rawAnswers = isPlainObject(parsed.answers) ? parsed.answers : parsed;
    const answers = createFormAnswers();
    for (const question of questions) {
        if (!Object.hasOwn(rawAnswers, question.id)) continue;
        const answer = coerceAnswer(question, rawAnswers[question.id]);
        if (answer !== undefined) {
            answers[question.id] = answer;
        }
    }
    return answers;
}
