import { GoogleGenAI } from '@google/genai';
import JSON5 from 'json5';
import { PROMPT_TEMPLATES, renderPrompt } from '../../shared/prompts';
import type { Logger } from '../obs/logger';
import type { ExternalClassifier } from '../playlist/classifier';

const PROMPT_NAME = 'channel_category.md';

export interface GeminiClassifierOptions {
  apiKey: string;
  model: string;
  logger?: Logger;
}

/** Minimal slice of the SDK surface this adapter calls; lets tests pass a stub. */
export interface GenerateContentClient {
  models: {
    generateContent(params: {
      model: string;
      contents: Array<{ role: string; parts: Array<{ text: string }> }>;
      config?: {
        temperature?: number;
        maxOutputTokens?: number;
        responseMimeType?: string;
        abortSignal?: AbortSignal;
      };
    }): Promise<{ text?: string }>;
  };
}

export const stripCodeFence = (value: string): string =>
  value.replace(/^```(?:json|json5|text)?\s*\r?\n?/, '').replace(/```[\s\r\n]*$/, '').trim();

const matchLabel = (candidate: string, allowedLabels: readonly string[]): string | null => {
  const wanted = candidate.trim().toLowerCase();
  if (!wanted) return null;
  return allowedLabels.find((label) => label.toLowerCase() === wanted) ?? null;
};

/**
 * Reads `{"label": ...}` (JSON5 tolerated) or a bare label out of a model reply. Anything that
 * is not one of `allowedLabels` yields null.
 */
export const parseLabelResponse = (text: string | undefined, allowedLabels: readonly string[]): string | null => {
  if (!text) return null;
  const body = stripCodeFence(text);
  if (!body) return null;
  let parsed: unknown;
  try {
    parsed = JSON5.parse(body);
  } catch {
    return matchLabel(body.replace(/^["']|["']$/g, ''), allowedLabels);
  }
  if (typeof parsed === 'string') {
    return matchLabel(parsed, allowedLabels);
  }
  if (parsed && typeof parsed === 'object' && 'label' in parsed) {
    const label: unknown = parsed.label;
    return typeof label === 'string' ? matchLabel(label, allowedLabels) : null;
  }
  return null;
};

export class GeminiChannelClassifier implements ExternalClassifier {
  private readonly client: GenerateContentClient;

  constructor(
    private readonly options: GeminiClassifierOptions,
    client?: GenerateContentClient,
  ) {
    this.client = client ?? new GoogleGenAI({ apiKey: options.apiKey });
  }

  async classify(text: string, allowedLabels: readonly string[], signal?: AbortSignal): Promise<string | null> {
    const template = PROMPT_TEMPLATES[PROMPT_NAME];
    if (!template) {
      throw new Error(`Missing prompt template: ${PROMPT_NAME}`);
    }
    const prompt = renderPrompt(template, {
      ALLOWED_LABELS: allowedLabels.map((label) => `- ${label}`).join('\n'),
      CHANNEL_NAME: JSON.stringify(text),
    });
    const response = await this.client.models.generateContent({
      model: this.options.model,
      contents: [{ role: 'user', parts: [{ text: prompt }] }],
      config: {
        temperature: 0,
        maxOutputTokens: 64,
        responseMimeType: 'application/json',
        abortSignal: signal,
      },
    });
    const label = parseLabelResponse(response.text, allowedLabels);
    if (!label) {
      this.options.logger?.debug('Classifier reply outside allowed labels', { text, reply: response.text });
    }
    return label;
  }
}
