// shared/storage.ts
import { BlobServiceClient } from "@azure/storage-blob";
import { connectionString, type Env } from "./config";

export interface BlobStore {
  read(container: string, path: string): Promise<Buffer>;
  /** Creates the container when missing; replaces an existing blob. */
  write(container: string, path: string, data: Buffer, contentType?: string): Promise<void>;
}

/**
 * Opens the storage account whose connection string lives in the app setting
 * named `envVar`. Callers pick the setting per request, so input and output
 * can sit in different accounts.
 */
export function blobStoreFromEnv(envVar: string, env: Env = process.env): BlobStore {
  const blob = BlobServiceClient.fromConnectionString(connectionString(envVar, env));

  return {
    async read(container, path) {
      const b = blob.getContainerClient(container).getBlobClient(path);
      const d = await b.download();
      if (!d.readableStreamBody) throw new Error(`Blob ${container}/${path} returned no content`);
      return await streamToBuffer(d.readableStreamBody);
    },

    async write(container, path, data, contentType) {
      const c = blob.getContainerClient(container);
      await c.createIfNotExists();
      const b = c.getBlockBlobClient(path);
      await b.uploadData(data, contentType ? { blobHTTPHeaders: { blobContentType: contentType } } : undefined);
    }
  };
}

async function streamToBuffer(readable: NodeJS.ReadableStream): Promise<Buffer> {
  return await new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    readable.on("data", (d) => chunks.push(Buffer.from(d)));
    readable.on("end", () => resolve(Buffer.concat(chunks)));
    readable.on("error", reject);
  });
}
