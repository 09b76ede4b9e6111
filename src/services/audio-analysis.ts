import type { RecordingAnalysis } from "../types.js";

const SAMPLE_WIDTH = 2; // 16-bit PCM
const CHANNELS = 1;
const WAV_HEADER_BYTES = 44;
const END_WINDOW_SEC = 0.1;
const SILENCE_THRESHOLD = 100;

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

function absoluteSamples(pcm: Buffer): number[] {
  const count = Math.floor(pcm.length / SAMPLE_WIDTH);
  const samples = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    samples[i] = Math.abs(pcm.readInt16LE(i * SAMPLE_WIDTH));
  }
  return samples;
}

/**
 * Summarises a mono 16-bit little-endian PCM capture.
 *
 * `packetTimes` are arrival times in milliseconds, one per captured frame.
 */
export function analyzeRecording(
  pcm: Buffer,
  packetTimes: readonly number[],
  sampleRate: number,
): RecordingAnalysis {
  const samples = absoluteSamples(pcm);
  const avgAmplitude = mean(samples);

  const endWindow = Math.floor(sampleRate * END_WINDOW_SEC);
  let avgEndAmplitude = avgAmplitude;
  let hasSilenceAtEnd = false;
  if (endWindow > 0 && samples.length >= endWindow) {
    avgEndAmplitude = mean(samples.slice(-endWindow));
    hasSilenceAtEnd = avgEndAmplitude < SILENCE_THRESHOLD;
  }

  const delays: number[] = [];
  let minDelay = Infinity;
  let maxDelay = -Infinity;
  for (let i = 1; i < packetTimes.length; i++) {
    const delay = packetTimes[i] - packetTimes[i - 1];
    delays.push(delay);
    minDelay = Math.min(minDelay, delay);
    maxDelay = Math.max(maxDelay, delay);
  }

  return {
    durationSec: samples.length / sampleRate,
    avgAmplitude,
    avgEndAmplitude,
    hasSilenceAtEnd,
    packetCount: packetTimes.length,
    avgInterPacketDelayMs: mean(delays),
    minInterPacketDelayMs: delays.length > 0 ? minDelay : 0,
    maxInterPacketDelayMs: delays.length > 0 ? maxDelay : 0,
  };
}

/**
 * Wraps raw PCM in a canonical 44-byte RIFF/WAVE header. A trailing odd byte
 * is dropped so the data chunk holds whole samples.
 */
export function encodeWav(capture: Buffer, sampleRate: number): Buffer {
  const pcm = capture.subarray(0, capture.length - (capture.length % SAMPLE_WIDTH));
  const header = Buffer.alloc(WAV_HEADER_BYTES);
  const blockAlign = CHANNELS * SAMPLE_WIDTH;

  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(CHANNELS, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(SAMPLE_WIDTH * 8, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}
