// G.711 mu-law companding (ITU-T G.711, 8-bit codes <-> 16-bit linear PCM).

const MULAW_BIAS = 0x84;
const MULAW_CLIP = 32635;

function clampInt16(value: number): number {
  if (value > 32767) return 32767;
  if (value < -32768) return -32768;
  return value | 0;
}

export function muLawToPcmSample(uLawByte: number): number {
  const u = (~uLawByte) & 0xff;
  const sign = u & 0x80;
  const exponent = (u >> 4) & 0x07;
  const mantissa = u & 0x0f;
  let sample = ((mantissa << 3) + MULAW_BIAS) << exponent;
  sample -= MULAW_BIAS;
  if (sign) sample = -sample;
  return clampInt16(sample);
}

export function pcmSampleToMuLaw(pcmSample: number): number {
  let sample = clampInt16(pcmSample);
  const sign = sample < 0 ? 0x80 : 0;
  if (sign) sample = -sample;
  if (sample > MULAW_CLIP) sample = MULAW_CLIP;
  sample += MULAW_BIAS;

  let exponent = 7;
  for (let mask = 0x4000; (sample & mask) === 0 && exponent > 0; mask >>= 1) {
    exponent -= 1;
  }
  const mantissa = (sample >> (exponent + 3)) & 0x0f;
  return (~(sign | (exponent << 4) | mantissa)) & 0xff;
}

/** mu-law bytes -> PCM16 little-endian bytes (two bytes per input byte). */
export function decodePcmu(payload: Buffer): Buffer {
  const out = Buffer.alloc(payload.length * 2);
  for (let i = 0; i < payload.length; i += 1) {
    out.writeInt16LE(muLawToPcmSample(payload[i] ?? 0xff), i * 2);
  }
  return out;
}

/** PCM16 little-endian bytes -> mu-law bytes. A trailing odd byte is ignored. */
export function encodePcmu(pcm16le: Buffer): Buffer {
  const samples = Math.floor(pcm16le.length / 2);
  const out = Buffer.alloc(samples);
  for (let i = 0; i < samples; i += 1) {
    out[i] = pcmSampleToMuLaw(pcm16le.readInt16LE(i * 2));
  }
  return out;
}
