/**
 * @module codec
 * Boundary with image encoders/decoders. The core never reads or writes files.
 */

import type { ImageFormat } from './document';
import type { RgbaImage } from './surface';

/** Success or failure of a codec call. */
export type CodecResult<T> = { ok: true; value: T } | { ok: false; error: Error };

/** Converts between encoded bytes and flat RGBA buffers. */
export interface ImageCodec {
  /** Decode encoded bytes into RGBA. */
  decode(bytes: Uint8Array, format: ImageFormat): CodecResult<RgbaImage>;
  /** Encode an RGBA buffer. */
  encode(image: RgbaImage, format: ImageFormat): CodecResult<Uint8Array>;
}
