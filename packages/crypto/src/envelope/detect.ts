/**
 * @sealnote/crypto - Envelope Detection
 *
 * Heuristics used before encrypting a file so an envelope is never encrypted twice.
 */

import { ENVELOPE_OVERHEAD } from '../constants';

/** Leading bytes of common media formats that are stored unencrypted. */
const PLAINTEXT_SIGNATURES: ReadonlyArray<readonly number[]> = [
  [0xff, 0xd8, 0xff], // JPEG
  [0x89, 0x50, 0x4e, 0x47], // PNG
  [0x47, 0x49, 0x46, 0x38], // GIF
  [0x52, 0x49, 0x46, 0x46], // RIFF (WebP, WAV)
  [0xff, 0xfb], // MP3 frame
  [0x49, 0x44, 0x33], // MP3 with ID3 tag
];

/** "ftyp" box marker at offset 4 (MP4, MOV, M4A) */
const FTYP = [0x66, 0x74, 0x79, 0x70];

function startsWith(data: Uint8Array, signature: readonly number[], offset = 0): boolean {
  if (data.length < offset + signature.length) {
    return false;
  }
  return signature.every((byte, i) => data[offset + i] === byte);
}

/**
 * Guess whether a buffer is a file envelope.
 *
 * Returns false when the buffer is too short to hold a nonce and tag, or when it
 * starts with a recognised plaintext file signature. Anything else is assumed
 * encrypted: envelopes have no magic bytes of their own.
 */
export function looksEncrypted(data: Uint8Array): boolean {
  if (data.length < ENVELOPE_OVERHEAD) {
    return false;
  }

  if (PLAINTEXT_SIGNATURES.some((signature) => startsWith(data, signature))) {
    return false;
  }

  return !startsWith(data, FTYP, 4);
}

/** Size of the envelope produced for a plaintext of the given size. */
export function encryptedSize(plaintextLength: number): number {
  return plaintextLength + ENVELOPE_OVERHEAD;
}

/** Size of the plaintext inside an envelope of the given size (0 if too short). */
export function plaintextSize(envelopeLength: number): number {
  return Math.max(0, envelopeLength - ENVELOPE_OVERHEAD);
}
