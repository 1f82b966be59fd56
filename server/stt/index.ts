/**
 * STT (Speech-to-Text) Pipeline
 *
 * Segment decoding and transcription for monitored stations.
 *
 * Architecture:
 * - AudioDecoder: compressed segment -> PCM16LE 16kHz mono (via ffmpeg)
 * - TranscriptionStage: PCM -> normalized text (via a pluggable Transcriber)
 *
 * Required Environment Variables:
 * - OPENAI_API_KEY: for the default Whisper transcriber
 * - FFMPEG_PATH (optional): ffmpeg binary, defaults to "ffmpeg" on PATH
 */

export { AudioDecoder, createFfmpegRunner, buildFfmpegArgs, TARGET_SAMPLE_RATE } from "./audio_decoder";
export type { PcmAudio, CodecJob, CodecRunner, SegmentDecoder, AudioDecoderConfig } from "./audio_decoder";

export { WhisperTranscriber, MockTranscriber, isWhisperConfigured } from "./transcriber";
export type { Transcriber, TranscribeOptions } from "./transcriber";

export { TranscriptionStage, normalizeTranscript } from "./transcription_stage";
export type { SegmentTranscriber, SegmentContext, TranscriptionStageConfig } from "./transcription_stage";

export { encodeWav, wavHeader, pcmDurationSeconds } from "./wav";
