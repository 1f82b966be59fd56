/**
 * Transcriber Interface & OpenAI Whisper Implementation
 *
 * Pluggable speech-to-text engine behind the transcription stage. The
 * default implementation sends decoded segments to OpenAI's Whisper API
 * as WAV files; anything else (a local model, another vendor) only has to
 * implement `Transcriber`.
 */

import OpenAI, { toFile } from "openai";
import type { PcmAudio } from "./audio_decoder";
import { encodeWav } from "./wav";

export interface TranscribeOptions {
  language: string;
  signal?: AbortSignal;
}

export interface Transcriber {
  readonly name: string;
  transcribe(pcm: PcmAudio, options: TranscribeOptions): Promise<string>;
}

/**
 * OpenAI Whisper-based transcriber
 */
export class WhisperTranscriber implements Transcriber {
  readonly name = "whisper";
  private client: OpenAI | null = null;
  private readonly apiKey: string | undefined;
  private readonly model: string;

  constructor(options: { apiKey?: string; model?: string } = {}) {
    this.apiKey = options.apiKey;
    this.model = options.model || "whisper-1";
  }

  private getClient(): OpenAI {
    if (!this.client) {
      const apiKey = this.apiKey || process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new Error("OPENAI_API_KEY is required for Whisper transcription");
      }
      this.client = new OpenAI({ apiKey });
    }
    return this.client;
  }

  async transcribe(pcm: PcmAudio, options: TranscribeOptions): Promise<string> {
    const client = this.getClient();
    const file = await toFile(encodeWav(pcm.data, pcm.sampleRate, pcm.channels), "segment.wav", {
      type: "audio/wav",
    });

    const transcription = await client.audio.transcriptions.create(
      {
        model: this.model,
        file,
        language: options.language,
        response_format: "json",
      },
      { signal: options.signal }
    );

    return transcription.text ?? "";
  }
}

/**
 * Scripted transcriber: returns queued responses in order. An Error in the
 * script is thrown instead of returned. Runs dry to "".
 */
export class MockTranscriber implements Transcriber {
  readonly name = "mock";
  readonly calls: Array<{ durationSeconds: number; language: string }> = [];
  private responses: Array<string | Error>;

  constructor(responses: Array<string | Error> = []) {
    this.responses = [...responses];
  }

  addResponse(response: string | Error): void {
    this.responses.push(response);
  }

  async transcribe(pcm: PcmAudio, options: TranscribeOptions): Promise<string> {
    this.calls.push({ durationSeconds: pcm.durationSeconds, language: options.language });
    const next = this.responses.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ?? "";
  }
}

export function isWhisperConfigured(): boolean {
  return !!process.env.OPENAI_API_KEY;
}
