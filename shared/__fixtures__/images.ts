import sharp from "sharp";

export interface DatasetSpec {
  record?: number;
  dataset: number;
  value: string | Buffer;
}

export function iimBlock(datasets: DatasetSpec[]): Buffer {
  return Buffer.concat(datasets.map(({ record = 2, dataset, value }) => {
    const data = typeof value === "string" ? Buffer.from(value, "utf-8") : value;
    const head = Buffer.from([0x1c, record, dataset, 0, 0]);
    head.writeUInt16BE(data.length, 3);
    return Buffer.concat([head, data]);
  }));
}

/** An 8BIM image resource with an empty pascal name. */
export function imageResource(id: number, data: Buffer): Buffer {
  const head = Buffer.alloc(12);
  head.write("8BIM", 0, "latin1");
  head.writeUInt16BE(id, 4);
  // bytes 6-7: empty name plus pad byte
  head.writeUInt32BE(data.length, 8);
  const pad = data.length % 2 ? Buffer.from([0]) : Buffer.alloc(0);
  return Buffer.concat([head, data, pad]);
}

export function app13Segment(resources: Buffer): Buffer {
  const payload = Buffer.concat([Buffer.from("Photoshop 3.0\0", "latin1"), resources]);
  const head = Buffer.from([0xff, 0xed, 0, 0]);
  head.writeUInt16BE(payload.length + 2, 2);
  return Buffer.concat([head, payload]);
}

/** Marker-only JPEG: enough for the metadata reader, not decodable as pixels. */
export function bareJpeg(...segments: Buffer[]): Buffer {
  return Buffer.concat([Buffer.from([0xff, 0xd8]), ...segments, Buffer.from([0xff, 0xd9])]);
}

export function withSegments(jpeg: Buffer, ...segments: Buffer[]): Buffer {
  return Buffer.concat([jpeg.subarray(0, 2), ...segments, jpeg.subarray(2)]);
}

export function iptcJpeg(jpeg: Buffer, datasets: DatasetSpec[]): Buffer {
  return withSegments(jpeg, app13Segment(imageResource(0x0404, iimBlock(datasets))));
}

export async function solidJpeg(width = 16, height = 12): Promise<Buffer> {
  return await sharp({ create: { width, height, channels: 3, background: { r: 200, g: 30, b: 30 } } }).jpeg().toBuffer();
}

export async function solidPng(width = 8, height = 8): Promise<Buffer> {
  return await sharp({ create: { width, height, channels: 4, background: { r: 0, g: 120, b: 255, alpha: 1 } } }).png().toBuffer();
}
