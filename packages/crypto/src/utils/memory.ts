/**
 * @sealnote/crypto - Memory Utilities
 *
 * Zero-fill helpers for key material. The JS runtime may still hold copies
 * (GC moves, JIT), so this narrows the exposure window and nothing more.
 */

/** Overwrite a buffer with zeros. Null is ignored. */
export function clearBytes(data: Uint8Array | null | undefined): void {
  if (data) {
    data.fill(0);
  }
}

/** Zero-fill every given buffer. */
export function clearAll(...buffers: (Uint8Array | null | undefined)[]): void {
  buffers.forEach(clearBytes);
}
