export const WAV_HEADER_BYTES = 44;

/** Wraps little-endian PCM samples in a canonical RIFF/WAVE header. */
export const encodeWav = (pcm: Uint8Array, sampleRate = 16000, channels = 1, bitDepth = 16) => {
  const blockAlign = channels * (bitDepth / 8);
  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVEfmt ', 8, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitDepth, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcm.length, 40);
  // Copied out of Buffer's shared pool so callers get a standalone ArrayBuffer.
  return new Uint8Array(Buffer.concat([header, pcm]));
};

/** Duration of 16-bit PCM audio in milliseconds. */
export const pcmDurationMs = (byteLength: number, sampleRate = 16000, channels = 1) =>
  Math.round((byteLength / 2 / channels / sampleRate) * 1000);
