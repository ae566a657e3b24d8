import { describe, it, expect } from 'vitest';
import { buildSummaryPrompt, fallbackSummary, Summarizer } from '../../src/services/summarizer';
import type { GenerateRequest, TextGenerator } from '../../src/services/gemini-client';
import { ModelError } from '../../src/utils/errors';
import { ok, err, type Result } from '../../src/utils/result';

class FakeGenerator implements TextGenerator {
  readonly model = 'fake-model';
  requests: GenerateRequest[] = [];

  constructor(private readonly reply: Result<string, ModelError>) {}

  async generate(request: GenerateRequest): Promise<Result<string, ModelError>> {
    this.requests.push(request);
    return this.reply;
  }
}

const LONG_TEXT = 'The build finished. All tests passed. Deployment is next. Nothing else to report.';

describe('fallbackSummary', () => {
  it('keeps the first two sentences', () => {
    expect(fallbackSummary(LONG_TEXT)).toBe('The build finished. All tests passed.');
  });

  it('returns short text unchanged', () => {
    expect(fallbackSummary('  no punctuation here ')).toBe('no punctuation here');
  });
});

describe('buildSummaryPrompt', () => {
  it('caps the input length', () => {
    const prompt = buildSummaryPrompt('x'.repeat(2500));

    expect(prompt).toContain(`Text: ${'x'.repeat(2000)}\n\nSummary:`);
    expect(prompt).not.toContain('x'.repeat(2001));
  });
});

describe('Summarizer', () => {
  it('uses the model answer', async () => {
    const generator = new FakeGenerator(ok('  Build passed, deploy next.  '));
    const summary = await new Summarizer(generator, 1000).summarize(LONG_TEXT);

    expect(summary.text).toBe('Build passed, deploy next.');
    expect(summary.fallback).toBe(false);
    expect(generator.requests[0].temperature).toBe(0.3);
    expect(generator.requests[0].maxTokens).toBe(200);
    expect(generator.requests[0].signal).toBeInstanceOf(AbortSignal);
  });

  it('falls back when the model fails', async () => {
    const summary = await new Summarizer(new FakeGenerator(err(new ModelError('offline'))), 1000).summarize(LONG_TEXT);

    expect(summary).toMatchObject({ text: 'The build finished. All tests passed.', fallback: true });
  });

  it('falls back without a model', async () => {
    const summary = await new Summarizer(null, 1000).summarize(LONG_TEXT);

    expect(summary).toMatchObject({ text: 'The build finished. All tests passed.', fallback: true });
  });
});
