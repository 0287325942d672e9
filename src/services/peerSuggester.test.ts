import { describe, it, expect, vi, afterEach } from 'vitest';
import type { GenerateContentParameters } from '@google/genai';
import {
  GeminiPeerSuggester,
  StaticPeerSuggester,
  buildPeerPrompt,
  minimumPeerCount,
  sanitizeTickers
} from './peerSuggester';

const generatorReturning = (text: string | undefined) => ({
  generateContent: vi.fn((_params: GenerateContentParameters) => Promise.resolve({ text }))
});

const candidates = ['msft', 'GOOGL', 'msft', 'ACME', 'META', 'AMZN', 'ORCL', 'not a ticker', 'CRM', 'ADBE', 'IBM'];

describe('sanitizeTickers', () => {
  it('uppercases, de-duplicates, drops the target and invalid symbols, and caps the list', () => {
    expect(sanitizeTickers(candidates, 8, 'acme')).toEqual(['MSFT', 'GOOGL', 'META', 'AMZN', 'ORCL', 'CRM', 'ADBE', 'IBM']);
    expect(sanitizeTickers(candidates, 3)).toEqual(['MSFT', 'GOOGL', 'ACME']);
  });

  it('keeps class-share and exchange suffixes', () => {
    expect(sanitizeTickers(['brk.b', 'RDS-A', '1ABC', ''], 5)).toEqual(['BRK.B', 'RDS-A']);
  });
});

describe('minimumPeerCount', () => {
  it('asks for at least five peers or half the request', () => {
    expect(minimumPeerCount(8)).toBe(5);
    expect(minimumPeerCount(15)).toBe(7);
  });
});

describe('GeminiPeerSuggester', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the validated tickers from a JSON array response', async () => {
    const generator = generatorReturning(JSON.stringify(candidates));
    const suggester = new GeminiPeerSuggester(generator, 'gemini-test');

    const peers = await suggester.suggest('ACME', 8);

    expect(peers).toEqual(['MSFT', 'GOOGL', 'META', 'AMZN', 'ORCL', 'CRM', 'ADBE', 'IBM']);
    expect(generator.generateContent).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'gemini-test',
        contents: buildPeerPrompt('ACME', 8),
        config: expect.objectContaining({ temperature: 0.4, responseMimeType: 'application/json' })
      })
    );
  });

  it('returns nothing when too few usable tickers come back', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const suggester = new GeminiPeerSuggester(generatorReturning('["AAA", "BBB"]'), 'gemini-test');

    expect(await suggester.suggest('ACME', 8)).toEqual([]);
    expect(warnSpy).toHaveBeenCalledWith('AI comps selection returned only 2 usable tickers');
  });

  it('returns nothing for a response that is not a ticker array', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const suggester = new GeminiPeerSuggester(generatorReturning('{"peers": []}'), 'gemini-test');

    expect(await suggester.suggest('ACME', 8)).toEqual([]);
    expect(warnSpy.mock.calls[0][0]).toBe('AI comps selection returned an unexpected shape:');
  });

  it('returns nothing when the response is not JSON', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const suggester = new GeminiPeerSuggester(generatorReturning('MSFT, GOOGL'), 'gemini-test');

    expect(await suggester.suggest('ACME', 8)).toEqual([]);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('returns nothing when the model call fails', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const generator = {
      generateContent: vi.fn((_params: GenerateContentParameters) => Promise.reject(new Error('model overloaded')))
    };
    const suggester = new GeminiPeerSuggester(generator, 'gemini-test');

    expect(await suggester.suggest('ACME', 8)).toEqual([]);
    expect(warnSpy).toHaveBeenCalledWith('AI comps selection failed: model overloaded');
  });
});

describe('StaticPeerSuggester', () => {
  it('sanitizes the fixed list against the target', async () => {
    const suggester = new StaticPeerSuggester(['msft', 'acme', 'googl']);
    expect(await suggester.suggest('ACME', 8)).toEqual(['MSFT', 'GOOGL']);
  });
});
