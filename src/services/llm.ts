import axios, { AxiosInstance } from 'axios';
import { errorMessage } from '../errors.js';

export type GenerationResult =
  | { status: 'ok'; text: string }
  | { status: 'unavailable'; reason: 'connection' | 'error'; message: string };

export interface TextGenerator {
  readonly model: string;
  generate(prompt: string): Promise<GenerationResult>;
}

export interface LlmServiceOptions {
  baseUrl: string;
  model: string;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
  client?: AxiosInstance;
}

interface GenerateResponse {
  response?: unknown;
}

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'ECONNABORTED', 'ETIMEDOUT', 'EHOSTUNREACH']);

/**
 * Ollama `/api/generate` client. Never throws: an unreachable or failing
 * backend comes back as an `unavailable` result.
 */
export class LlmService implements TextGenerator {
  readonly model: string;
  private readonly api: AxiosInstance;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: LlmServiceOptions) {
    this.model = options.model;
    this.temperature = options.temperature ?? 0.2;
    this.maxTokens = options.maxTokens ?? 512;
    this.api =
      options.client ??
      axios.create({
        baseURL: options.baseUrl.replace(/\/+$/, ''),
        timeout: options.timeoutMs ?? 60_000,
        headers: {
          'Content-Type': 'application/json',
        },
      });
  }

  async generate(prompt: string): Promise<GenerationResult> {
    try {
      const response = await this.api.post<GenerateResponse>('/api/generate', {
        model: this.model,
        prompt,
        stream: false,
        options: {
          temperature: this.temperature,
          num_predict: this.maxTokens,
        },
      });

      const text = response.data.response;
      if (typeof text !== 'string') {
        return { status: 'unavailable', reason: 'error', message: 'Generation response does not contain text' };
      }
      return { status: 'ok', text: text.trim() || 'No response generated.' };
    } catch (error) {
      if (axios.isAxiosError(error) && !error.response && CONNECTION_ERROR_CODES.has(error.code ?? '')) {
        console.warn(`LLM connection failed: ${error.message}`);
        return { status: 'unavailable', reason: 'connection', message: error.message };
      }
      console.error('LLM generation failed:', error);
      return { status: 'unavailable', reason: 'error', message: errorMessage(error) };
    }
  }
}
