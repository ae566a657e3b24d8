import { describe, it, expect } from 'vitest';
import { parseScoreLine, WakeWordDetector, type WakeWordClassifier } from '../../src/services/wake-word';
import { AudioSource } from '../../src/services/audio-source';
import { SimulatedAudioDevice } from '../../src/services/audio-devices';

class FakeClassifier implements WakeWordClassifier {
  fed: number[] = [];
  stopped = false;
  private onScore: ((score: number, label: string) => void) | null = null;

  async start(onScore: (score: number, label: string) => void): Promise<void> {
    this.onScore = onScore;
  }

  feed(samples: Float32Array): void {
    this.fed.push(samples.length);
  }

  async stop(): Promise<void> {
    this.stopped = true;
  }

  score(value: number, label: string): void {
    this.onScore?.(value, label);
  }
}

const nextTick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('parseScoreLine', () => {
  it('reads label and score', () => {
    expect(parseScoreLine('{"label":"hey_jarvis","score":0.93}')).toEqual({ score: 0.93, label: 'hey_jarvis' });
    expect(parseScoreLine('{"score":"0.7"}')).toEqual({ score: 0.7, label: 'wakeword' });
  });

  it('ignores malformed lines', () => {
    expect(parseScoreLine('loading model')).toBeNull();
    expect(parseScoreLine('{"label":"x"}')).toBeNull();
    expect(parseScoreLine('{"score":"abc"}')).toBeNull();
  });
});

describe('WakeWordDetector', () => {
  it('fires above the threshold and respects the cooldown', () => {
    let now = 0;
    const detector = new WakeWordDetector(new FakeClassifier(), {
      threshold: 0.5,
      cooldownMs: 1000,
      pendingCapacity: 100,
      now: () => now,
    });
    const detected: string[] = [];
    detector.on('detected', (_score: number, label: string) => detected.push(label));

    expect(detector.handleScore(0.4, 'low')).toBe(false);
    expect(detector.handleScore(0.9, 'first')).toBe(true);
    now = 500;
    expect(detector.handleScore(0.9, 'cooling')).toBe(false);
    now = 1000;
    expect(detector.handleScore(0.9, 'second')).toBe(true);

    expect(detected).toEqual(['first', 'second']);
  });

  it('feeds buffered frames off the frame callback and drops overflow', async () => {
    const device = new SimulatedAudioDevice();
    const source = new AudioSource(device, {
      sampleRate: 16000,
      frameSize: 1600,
      preRollSeconds: 0,
      maxCaptureSeconds: 1,
      silenceWindowSeconds: 1,
      reconnectMaxRetries: 1,
      reconnectBaseDelayMs: 1,
      reconnectMaxDelayMs: 1,
    });
    await source.start();

    const classifier = new FakeClassifier();
    const detector = new WakeWordDetector(classifier, { threshold: 0.5, cooldownMs: 0, pendingCapacity: 2000 });
    await detector.start(source);

    device.push(new Float32Array(1600));
    device.push(new Float32Array(1600));
    expect(classifier.fed).toEqual([]);

    await nextTick();
    expect(classifier.fed).toEqual([2000]);

    device.push(new Float32Array(1600));
    await nextTick();
    expect(classifier.fed).toEqual([2000, 1600]);

    await detector.stop();
    device.push(new Float32Array(1600));
    await nextTick();
    expect(classifier.fed).toEqual([2000, 1600]);
    expect(classifier.stopped).toBe(true);

    await source.stop();
  });

  it('emits detections reported by the classifier', async () => {
    const classifier = new FakeClassifier();
    const detector = new WakeWordDetector(classifier, { threshold: 0.5, cooldownMs: 0, pendingCapacity: 10 });
    const source = new AudioSource(new SimulatedAudioDevice(), {
      sampleRate: 16000,
      frameSize: 160,
      preRollSeconds: 0,
      maxCaptureSeconds: 1,
      silenceWindowSeconds: 1,
      reconnectMaxRetries: 1,
      reconnectBaseDelayMs: 1,
      reconnectMaxDelayMs: 1,
    });
    const scores: number[] = [];
    detector.on('detected', (score: number) => scores.push(score));

    await detector.start(source);
    classifier.score(0.95, 'hey');

    expect(scores).toEqual([0.95]);
    await detector.stop();
  });
});
