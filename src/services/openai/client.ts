import axios, { AxiosInstance } from 'axios';
import { ApiError } from '../../errors';

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_TIMEOUT_MS = 30000;

export type ChatClient = Pick<AxiosInstance, 'post'>;

export type ChatMessage = {
  role: 'system' | 'user' | 'assistant';
  content: string;
};

export type ChatCompletionRequest = {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
  response_format?: { type: 'json_object' | 'text' };
};

type ChatCompletionResponse = {
  choices?: Array<{ message?: { content?: string | null } }>;
};

/**
 * axios instance for the OpenAI REST API. Every request is bounded by
 * `timeoutMs`.
 */
export function createOpenAIClient(apiKey: string, timeoutMs: number = DEFAULT_TIMEOUT_MS): ChatClient {
  if (!apiKey) {
    throw new ApiError('OpenAI API key is not configured');
  }

  return axios.create({
    baseURL: OPENAI_BASE_URL,
    headers: {
      Authorization: `Bearer ${apiKey}`,
      'Content-Type': 'application/json',
    },
    timeout: timeoutMs,
  });
}

export const toApiError = (error: unknown): ApiError => {
  if (error instanceof ApiError) return error;
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new ApiError('Model request timed out', { originalError: error });
    }
    const status = error.response?.status;
    return new ApiError(
      status ? `Model request failed with status ${status}` : `Model request failed: ${error.message}`,
      { status, originalError: error },
    );
  }
  return new ApiError(
    `Model request failed: ${error instanceof Error ? error.message : String(error)}`,
    { originalError: error },
  );
};

/**
 * POST /chat/completions and return the trimmed content of the first choice
 * ('' when the model sent none). Transport failures surface as ApiError.
 */
export async function requestChatCompletion(
  client: ChatClient,
  body: ChatCompletionRequest,
): Promise<string> {
  try {
    const response = await client.post<ChatCompletionResponse>('/chat/completions', body);
    return response.data?.choices?.[0]?.message?.content?.trim() ?? '';
  } catch (error) {
    throw toApiError(error);
  }
}
