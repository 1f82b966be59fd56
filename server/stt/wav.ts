/**
 * Minimal RIFF/WAVE framing for PCM16LE so engines that expect an audio
 * file (rather than raw samples) can take decoded segments.
 */

const WAV_HEADER_BYTES = 44;

export function wavHeader(pcmDataBytes: number, sampleRate: number, numChannels: number): Buffer {
  const bytesPerSample = 2;
  const blockAlign = numChannels * bytesPerSample;
  const byteRate = sampleRate * blockAlign;

  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcmDataBytes, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16); // fmt chunk size
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(16, 34); // bits per sample
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcmDataBytes, 40);
  return header;
}

export function encodeWav(pcm16le: Buffer, sampleRate: number, numChannels: number = 1): Buffer {
  return Buffer.concat([wavHeader(pcm16le.length, sampleRate, numChannels), pcm16le]);
}

export function pcmDurationSeconds(pcm16le: Buffer, sampleRate: number, numChannels: number = 1): number {
  if (pcm16le.length === 0) {
    return 0;
  }
  return pcm16le.length / (2 * numChannels * sampleRate);
}
