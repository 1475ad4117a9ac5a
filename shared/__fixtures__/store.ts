import type { BlobStore } from "../storage";

export interface StoredBlob {
  data: Buffer;
  contentType?: string;
}

/** In-memory BlobStore keyed by `<container>/<path>`. */
export class MemoryBlobStore implements BlobStore {
  readonly blobs = new Map<string, StoredBlob>();

  put(container: string, path: string, data: Buffer): this {
    this.blobs.set(`${container}/${path}`, { data });
    return this;
  }

  async read(container: string, path: string): Promise<Buffer> {
    const hit = this.blobs.get(`${container}/${path}`);
    if (!hit) throw new Error(`The specified blob does not exist: ${container}/${path}`);
    return hit.data;
  }

  async write(container: string, path: string, data: Buffer, contentType?: string): Promise<void> {
    this.blobs.set(`${container}/${path}`, { data, contentType });
  }
}
