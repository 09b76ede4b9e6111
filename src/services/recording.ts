import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type {
  DeviceName,
  RecordingConfig,
  RecordingSummary,
} from "../types.js";
import type { IRecordingSink } from "../interfaces.js";
import { analyzeRecording, encodeWav } from "./audio-analysis.js";

interface ActiveRecording {
  deviceName: DeviceName;
  fileName: string;
  chunks: Buffer[];
  packetTimes: number[];
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function timestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function recordingFileName(deviceName: DeviceName, at: Date): string {
  const safe = deviceName.replace(/[^a-zA-Z0-9_-]/g, "_").slice(0, 64);
  return `transmission_${timestamp(at)}_${safe}.wav`;
}

/**
 * Diagnostic capture of relayed audio. One recording spans a transmission,
 * from the tracker leaving idle until it returns to idle, and is written as
 * a WAV file with a quality summary in the log.
 */
export class RecordingSink implements IRecordingSink {
  private current: ActiveRecording | null = null;

  constructor(
    private readonly config: RecordingConfig,
    private readonly clock: () => number = Date.now,
  ) {}

  isRecording(): boolean {
    return this.current !== null;
  }

  begin(deviceName: DeviceName): void {
    if (this.current) return;
    this.current = {
      deviceName,
      fileName: recordingFileName(deviceName, new Date(this.clock())),
      chunks: [],
      packetTimes: [],
    };
    console.log(`[recording] Started ${this.current.fileName}`);
  }

  capture(payload: Buffer): void {
    if (!this.current) return;
    this.current.chunks.push(Buffer.from(payload));
    this.current.packetTimes.push(this.clock());
  }

  async finish(): Promise<RecordingSummary | null> {
    const recording = this.current;
    this.current = null;
    if (!recording) return null;

    if (recording.chunks.length === 0) {
      console.warn(`[recording] No audio captured for ${recording.deviceName}`);
      return null;
    }

    const pcm = Buffer.concat(recording.chunks);
    const filePath = join(this.config.directory, recording.fileName);
    await mkdir(this.config.directory, { recursive: true });
    await writeFile(filePath, encodeWav(pcm, this.config.sampleRate));

    const analysis = analyzeRecording(
      pcm,
      recording.packetTimes,
      this.config.sampleRate,
    );
    console.log(
      `[recording] Saved ${filePath} (${pcm.length} bytes) for ${recording.deviceName}`,
    );
    console.log(
      `[recording] duration=${analysis.durationSec.toFixed(2)}s ` +
        `avgAmplitude=${analysis.avgAmplitude.toFixed(2)} ` +
        `endAmplitude=${analysis.avgEndAmplitude.toFixed(2)} ` +
        `silenceAtEnd=${analysis.hasSilenceAtEnd ? "yes" : "no"} ` +
        `packets=${analysis.packetCount}`,
    );
    if (analysis.packetCount > 1) {
      console.log(
        `[recording] interPacketDelay avg=${analysis.avgInterPacketDelayMs.toFixed(2)}ms ` +
          `min=${analysis.minInterPacketDelayMs.toFixed(2)}ms ` +
          `max=${analysis.maxInterPacketDelayMs.toFixed(2)}ms`,
      );
    }

    return {
      filePath,
      deviceName: recording.deviceName,
      bytes: pcm.length,
      analysis,
    };
  }
}
