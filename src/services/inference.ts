import { env } from '../config/env.js';
import { InferenceError, errorMessage } from './errors.js';
import { asRecord, isRecord, readString } from './providers/json.js';
import type { FetchImpl } from './providers/labelApiClient.js';

export interface InferenceClientOptions {
  endpoint: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  fetchImpl?: FetchImpl;
}

export interface InferenceClient {
  /** Sends `prompt` and resolves to the parsed JSON object the model produced. */
  generateJson(prompt: string, options?: { temperature?: number }): Promise<Record<string, unknown>>;
}

const isTimeout = (error: unknown) =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

export const createInferenceClient = (options: InferenceClientOptions): InferenceClient => {
  const fetchImpl: FetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const url = `${options.endpoint.replace(/\/+$/, '')}/api/generate`;

  const generateJson = async (prompt: string, overrides: { temperature?: number } = {}) => {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: options.model,
          prompt,
          format: 'json',
          stream: false,
          options: { temperature: overrides.temperature ?? options.temperature },
        }),
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new InferenceError('timeout', `inference timed out after ${options.timeoutMs}ms`, { cause: error });
      }
      throw new InferenceError('transport', `inference request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new InferenceError('transport', `inference endpoint returned ${response.status}`);
    }

    let envelope: unknown;
    try {
      envelope = await response.json();
    } catch (error) {
      if (isTimeout(error)) {
        throw new InferenceError('timeout', `inference timed out after ${options.timeoutMs}ms`, { cause: error });
      }
      throw new InferenceError('malformed', 'inference endpoint returned non-JSON body', { cause: error });
    }

    const text = readString(asRecord(envelope), 'response');
    if (text === null) {
      throw new InferenceError('malformed', 'inference response has no "response" field');
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new InferenceError('malformed', 'model output is not valid JSON', { cause: error });
    }
    if (!isRecord(parsed)) {
      throw new InferenceError('malformed', 'model output is not a JSON object');
    }
    return parsed;
  };

  return { generateJson };
};

export const createDefaultInferenceClient = () =>
  createInferenceClient({
    endpoint: env.ai.endpoint,
    model: env.ai.model,
    temperature: env.ai.temperature,
    timeoutMs: env.ai.timeoutMs,
  });
