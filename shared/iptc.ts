// shared/iptc.ts
// Reads IPTC-IIM datasets out of the Photoshop APP13 segment of a JPEG.
import iptcTags from "./iptc-tags.json";

export interface IptcTag { tag: number; name: string }

export const IPTC_TAGS: readonly IptcTag[] = [...iptcTags].sort((a, b) => a.tag - b.tag);

const APPLICATION_RECORD = 2;
const IPTC_RESOURCE_ID = 0x0404;
const PHOTOSHOP_HEADER = "Photoshop 3.0\0";

export class IptcParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IptcParseError";
  }
}

export class IptcMetadata {
  private readonly datasets = new Map<number, Buffer[]>();

  static empty(): IptcMetadata { return new IptcMetadata(); }

  add(dataset: number, value: Buffer): void {
    const values = this.datasets.get(dataset);
    if (values) values.push(value);
    else this.datasets.set(dataset, [value]);
  }

  /** First value of an application-record dataset. */
  get(dataset: number): Buffer | undefined {
    return this.datasets.get(dataset)?.[0];
  }

  getAll(dataset: number): Buffer[] {
    return [...(this.datasets.get(dataset) ?? [])];
  }

  get size(): number { return this.datasets.size; }
}

/** First tag, in ascending order, whose name contains `field` (case-insensitive); -1 when none. */
export function tagForField(field: string): number {
  const needle = field.toLowerCase();
  const hit = IPTC_TAGS.find(t => t.name.toLowerCase().includes(needle));
  return hit ? hit.tag : -1;
}

export function readIptc(data: Buffer): IptcMetadata {
  const meta = new IptcMetadata();
  for (const segment of photoshopSegments(data)) {
    for (const block of iptcResources(segment)) parseDatasets(block, meta);
  }
  return meta;
}

// --- JPEG markers

function* photoshopSegments(data: Buffer): Generator<Buffer> {
  if (data.length < 4 || data[0] !== 0xff || data[1] !== 0xd8) return;
  let pos = 2;
  while (pos < data.length) {
    if (data[pos] !== 0xff) throw new IptcParseError(`Expected JPEG marker at offset ${pos}`);
    while (data[pos] === 0xff) pos++; // fill bytes
    if (pos >= data.length) return;
    const marker = data[pos++];
    if (marker === 0xd9 || marker === 0xda) return; // EOI / SOS: metadata lives before the scan
    if (marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7)) continue;
    if (pos + 2 > data.length) throw new IptcParseError("Truncated JPEG segment length");
    const len = data.readUInt16BE(pos);
    if (len < 2 || pos + len > data.length) throw new IptcParseError(`JPEG segment 0x${marker.toString(16)} overruns the file`);
    if (marker === 0xed) {
      const payload = data.subarray(pos + 2, pos + len);
      if (payload.subarray(0, PHOTOSHOP_HEADER.length).toString("latin1") === PHOTOSHOP_HEADER) {
        yield payload.subarray(PHOTOSHOP_HEADER.length);
      }
    }
    pos += len;
  }
}

// --- Photoshop image resources ("8BIM" blocks)

function* iptcResources(resources: Buffer): Generator<Buffer> {
  let pos = 0;
  while (pos + 12 <= resources.length) {
    if (resources.subarray(pos, pos + 4).toString("latin1") !== "8BIM") return;
    const id = resources.readUInt16BE(pos + 4);
    pos += 6;
    const nameLen = resources[pos];
    pos += nameLen + 1;
    if (pos % 2 === 1) pos++; // pascal name padded to even length
    if (pos + 4 > resources.length) throw new IptcParseError("Truncated image resource header");
    const size = resources.readUInt32BE(pos);
    pos += 4;
    if (pos + size > resources.length) throw new IptcParseError(`Image resource 0x${id.toString(16)} overruns its segment`);
    if (id === IPTC_RESOURCE_ID) yield resources.subarray(pos, pos + size);
    pos += size + (size % 2);
  }
}

// --- IIM datasets

function parseDatasets(block: Buffer, meta: IptcMetadata): void {
  let pos = 0;
  while (pos + 5 <= block.length) {
    if (block[pos] !== 0x1c) {
      pos++; // skip padding between datasets
      continue;
    }
    const record = block[pos + 1];
    const dataset = block[pos + 2];
    let size = block.readUInt16BE(pos + 3);
    pos += 5;
    if (size & 0x8000) {
      // extended dataset: low bits give the byte count of the real length
      const lenBytes = size & 0x7fff;
      if (lenBytes === 0 || lenBytes > 4 || pos + lenBytes > block.length) throw new IptcParseError("Invalid extended dataset length");
      size = block.readUIntBE(pos, lenBytes);
      pos += lenBytes;
    }
    if (pos + size > block.length) throw new IptcParseError(`Dataset ${record}:${dataset} overruns the IPTC block`);
    if (record === APPLICATION_RECORD) meta.add(dataset, block.subarray(pos, pos + size));
    pos += size;
  }
}
