/**
 * 音频数据工具函数
 */

/**
 * 均方根能量
 */
export function computeRms(samples: Float32Array): number {
  if (samples.length === 0) {
    return 0;
  }

  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    const value = samples[i];
    sum += value * value;
  }

  return Math.sqrt(sum / samples.length);
}

/**
 * s16le 字节转 Float32，写入 out，返回写入的采样数
 */
export function pcm16ToFloat(bytes: Buffer, out: Float32Array): number {
  const count = Math.min(out.length, Math.floor(bytes.length / 2));
  for (let i = 0; i < count; i++) {
    out[i] = bytes.readInt16LE(i * 2) / 32768;
  }
  return count;
}

/**
 * Float32 转 s16le 字节
 */
export function floatToPcm16(samples: Float32Array): Buffer {
  const buffer = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i]));
    buffer.writeInt16LE(Math.round(clamped < 0 ? clamped * 32768 : clamped * 32767), i * 2);
  }
  return buffer;
}

/**
 * 编码为 16-bit 单声道 WAV
 */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  const pcm = floatToPcm16(samples);
  const header = Buffer.alloc(44);

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16); // fmt chunk size
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(1, 22); // mono
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * 2, 28); // byte rate
  header.writeUInt16LE(2, 32); // block align
  header.writeUInt16LE(16, 34); // bits per sample
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}
