import { createHash } from "node:crypto";
import { UnsupportedFormat } from "./errors.js";

export const IMAGE_MEDIA_TYPES = ["image/png", "image/jpeg", "image/webp", "image/gif"] as const;
export type ImageMediaType = (typeof IMAGE_MEDIA_TYPES)[number];

export const MAX_IMAGE_BYTES = 20 * 1024 * 1024;

const MEDIA_TYPE_ALIASES: Record<string, ImageMediaType> = {
  "image/png": "image/png",
  "image/jpeg": "image/jpeg",
  "image/jpg": "image/jpeg",
  "image/pjpeg": "image/jpeg",
  "image/webp": "image/webp",
  "image/gif": "image/gif"
};

export type DecodedImage = Readonly<{
  mediaType: ImageMediaType;
  byteLength: number;
  sha256: string;
  base64: string;
}>;

function startsWith(bytes: Uint8Array, signature: readonly number[], offset = 0): boolean {
  if (bytes.length < offset + signature.length) return false;
  return signature.every((b, i) => bytes[offset + i] === b);
}

/** Media type implied by the file signature, or null when unrecognised. */
export function sniffMediaType(bytes: Uint8Array): ImageMediaType | null {
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return "image/png";
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return "image/jpeg";
  if (startsWith(bytes, [0x47, 0x49, 0x46, 0x38])) return "image/gif";
  // RIFF....WEBP
  if (startsWith(bytes, [0x52, 0x49, 0x46, 0x46]) && startsWith(bytes, [0x57, 0x45, 0x42, 0x50], 8)) return "image/webp";
  return null;
}

export function normalizeMediaType(declared: string): ImageMediaType | null {
  const key = declared.split(";")[0].trim().toLowerCase();
  return MEDIA_TYPE_ALIASES[key] ?? null;
}

export function ingestImage(bytes: Uint8Array, declaredMediaType: string): DecodedImage {
  const mediaType = normalizeMediaType(declaredMediaType);
  if (!mediaType) throw new UnsupportedFormat(`Unsupported image media type: ${declaredMediaType || "(none)"}`);
  if (bytes.length === 0) throw new UnsupportedFormat("Image is empty");
  if (bytes.length > MAX_IMAGE_BYTES) {
    throw new UnsupportedFormat(`Image is ${bytes.length} bytes; the limit is ${MAX_IMAGE_BYTES}`);
  }

  const sniffed = sniffMediaType(bytes);
  if (sniffed !== mediaType) {
    throw new UnsupportedFormat(`Image content does not match declared type ${mediaType}`);
  }

  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return Object.freeze({
    mediaType,
    byteLength: buf.byteLength,
    sha256: createHash("sha256").update(buf).digest("hex"),
    base64: buf.toString("base64")
  });
}

export function imageDataUri(image: DecodedImage): string {
  return `data:${image.mediaType};base64,${image.base64}`;
}

export function describeImage(image: DecodedImage): string {
  return `${image.mediaType}, ${image.byteLength} bytes, sha256 ${image.sha256.slice(0, 12)}`;
}
