// shared/imaging.ts
import sharp from "sharp";

export interface ImageInfo {
  format: string;
  width: number;
  height: number;
}

/** Rejects when the bytes are not an image sharp can decode. */
export async function describeImage(data: Buffer): Promise<ImageInfo> {
  const meta = await sharp(data).metadata();
  if (!meta.format || !meta.width || !meta.height) throw new Error("Unrecognised image data");
  return { format: meta.format, width: meta.width, height: meta.height };
}

export async function toJpeg(data: Buffer): Promise<Buffer> {
  return await sharp(data).jpeg().toBuffer();
}

export function decodeBase64Image(encoded: string): Buffer {
  const bytes = Buffer.from(encoded, "base64");
  if (bytes.length === 0) throw new Error("Detection is not base64 image data");
  return bytes;
}
