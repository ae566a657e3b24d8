import { describe, it, expect } from 'vitest';
import { promises as fs } from 'fs';
import {
  buildVocabularyPrompt,
  CommandTranscriber,
  createTranscriber,
  GeminiTranscriber,
} from '../../src/services/transcriber';
import type { GenerateRequest, TextGenerator } from '../../src/services/gemini-client';
import type { CommandRunner } from '../../src/services/run-command';
import { fileExists } from '../../src/utils/file-adapter';
import { CommandError, ModelError } from '../../src/utils/errors';
import { ok, err, type Result } from '../../src/utils/result';

class FakeGenerator implements TextGenerator {
  readonly model = 'fake-audio';
  requests: GenerateRequest[] = [];

  constructor(private readonly reply: Result<string, ModelError>) {}

  async generate(request: GenerateRequest): Promise<Result<string, ModelError>> {
    this.requests.push(request);
    return this.reply;
  }
}

const input = (vocabulary: string[] = []) => ({
  samples: new Float32Array(160).fill(0.1),
  sampleRate: 16000,
  biasVocabulary: vocabulary,
  signal: new AbortController().signal,
});

describe('buildVocabularyPrompt', () => {
  it('joins terms into one sentence', () => {
    expect(buildVocabularyPrompt(['Kubernetes', 'Vitest'])).toBe('Vocabulary: Kubernetes, Vitest.');
    expect(buildVocabularyPrompt([])).toBe('');
  });
});

describe('CommandTranscriber', () => {
  it('writes a WAV file, runs the command and cleans up', async () => {
    const seen: { args: string[]; size: number }[] = [];
    const runner: CommandRunner = async (_command, args) => {
      const file = args[3];
      const stat = await fs.stat(file);
      seen.push({ args, size: stat.size });
      return ok({ stdout: ' hello\n world \n', stderr: '' });
    };
    const transcriber = new CommandTranscriber({
      command: 'whisper-cli',
      args: ['-m', 'model.bin', '-f', '{file}', '--prompt', '{prompt}', '-l', '{language}'],
      language: 'en',
      runner,
    });

    const result = await transcriber.transcribe(input(['Kubernetes']));

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.text).toBe('hello world');
    }
    expect(transcriber.name).toBe('command:whisper-cli');
    expect(seen).toHaveLength(1);
    expect(seen[0].size).toBe(44 + 160 * 2);
    expect(seen[0].args[3].endsWith('capture.wav')).toBe(true);
    expect(seen[0].args.slice(4)).toEqual(['--prompt', 'Vocabulary: Kubernetes.', '-l', 'en']);
    expect(await fileExists(seen[0].args[3])).toBe(false);
  });

  it('returns the command error', async () => {
    const failure = new CommandError('whisper-cli crashed');
    const transcriber = new CommandTranscriber({
      command: 'whisper-cli',
      args: ['{file}'],
      language: 'en',
      runner: async () => err(failure),
    });

    expect(await transcriber.transcribe(input())).toEqual({ success: false, error: failure });
  });
});

describe('GeminiTranscriber', () => {
  it('sends inline WAV audio with the vocabulary hint', async () => {
    const generator = new FakeGenerator(ok('  Deploy  the   cluster. '));
    const transcriber = new GeminiTranscriber(generator);

    const result = await transcriber.transcribe(input(['Kubernetes']));

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.text).toBe('Deploy the cluster.');
    }
    const request = generator.requests[0];
    expect(request.audio?.length).toBe(44 + 160 * 2);
    expect(request.temperature).toBe(0);
    expect(request.prompt.endsWith('\nVocabulary: Kubernetes.')).toBe(true);
  });
});

describe('createTranscriber', () => {
  it('needs a Gemini client for the gemini engine', () => {
    expect(() =>
      createTranscriber('gemini', { gemini: null, command: { command: 'x', args: [], language: 'en' } })
    ).toThrow(ModelError);
  });

  it('builds a command transcriber', () => {
    const transcriber = createTranscriber('command', {
      gemini: null,
      command: { command: 'whisper-cli', args: [], language: 'en' },
    });
    expect(transcriber).toBeInstanceOf(CommandTranscriber);
  });
});
