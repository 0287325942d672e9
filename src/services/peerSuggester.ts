import { Type, type GenerateContentParameters } from '@google/genai';
import { z } from 'zod';
import type { PeerSuggester } from '../types';
import { describeError } from '../utils/errors';

/** The slice of `GoogleGenAI['models']` the suggester needs; pass `ai.models`. */
export interface ContentGenerator {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

const TickerListSchema = z.array(z.string());

const TICKER_PATTERN = /^[A-Z][A-Z0-9.-]{0,9}$/;

// Fewer comps than this makes the percentile ranges meaningless.
export const minimumPeerCount = (requested: number): number => Math.max(5, Math.floor(requested / 2));

/** Uppercases, de-duplicates and caps the candidates; drops anything that is not a listed-symbol shape. */
export const sanitizeTickers = (candidates: readonly string[], count: number, exclude?: string): string[] => {
  const excluded = exclude?.trim().toUpperCase();
  const seen = new Set<string>();
  const valid: string[] = [];

  for (const candidate of candidates) {
    const ticker = candidate.trim().toUpperCase();
    if (seen.has(ticker)) continue;
    seen.add(ticker);
    if (ticker === excluded || !TICKER_PATTERN.test(ticker)) continue;
    valid.push(ticker);
    if (valid.length >= count) break;
  }
  return valid;
};

export const buildPeerPrompt = (companyOrTicker: string, count: number): string => `
You are an equity analyst. Return ONLY a JSON array of ${count} liquid, listed
peer tickers that are the closest business comparables for: "${companyOrTicker}".
Prefer same sub-industry, similar business model and revenue scale. Avoid ETFs,
indices, preferreds, warrants, duplicates, or non-listed symbols. Output ONLY JSON.
`.trim();

export class GeminiPeerSuggester implements PeerSuggester {
  constructor(
    private readonly models: ContentGenerator,
    private readonly model: string
  ) {}

  async suggest(companyOrTicker: string, count: number): Promise<string[]> {
    try {
      const response = await this.models.generateContent({
        model: this.model,
        contents: buildPeerPrompt(companyOrTicker, count),
        config: {
          temperature: 0.4,
          maxOutputTokens: 1024,
          responseMimeType: 'application/json',
          responseSchema: {
            type: Type.ARRAY,
            items: { type: Type.STRING },
            description: 'List of stock tickers (e.g., AAPL, MSFT). No explanations.'
          }
        }
      });

      const parsed = TickerListSchema.safeParse(JSON.parse(response.text ?? ''));
      if (!parsed.success) {
        console.warn('AI comps selection returned an unexpected shape:', parsed.error.message);
        return [];
      }

      const validated = sanitizeTickers(parsed.data, count, companyOrTicker);
      if (validated.length >= minimumPeerCount(count)) {
        return validated;
      }
      console.warn(`AI comps selection returned only ${validated.length} usable tickers`);
    } catch (error) {
      // Model overload, network flake or malformed JSON: carry on without comps.
      console.warn(`AI comps selection failed: ${describeError(error)}`);
    }
    return [];
  }
}

/** A fixed, caller-supplied peer list. */
export class StaticPeerSuggester implements PeerSuggester {
  constructor(private readonly tickers: readonly string[]) {}

  async suggest(companyOrTicker: string, count: number): Promise<string[]> {
    return sanitizeTickers(this.tickers, count, companyOrTicker);
  }
}
