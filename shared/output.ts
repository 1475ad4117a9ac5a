// shared/output.ts
import type { Logger } from "@azure/functions";
import { decodeBase64Image, toJpeg } from "./imaging";
import type { BlobStore } from "./storage";

export interface WriteDetectionsInput {
  container: string;
  folder: string;
  identifier: string;
  source: string;
  detections: string[];
  onlySingle: boolean;
}

/** `<folder>/<identifier>/<stem>_cropped_<idx>.JPG`, stem being the source basename up to its first dot. */
export function outputBlobPath(folder: string, identifier: string, source: string, idx: number): string {
  const basename = source.split("/").pop() ?? source;
  const stem = basename.split(".")[0];
  return [...folder.split("/"), identifier, `${stem}_cropped_${idx}.JPG`]
    .filter(s => s.length > 0)
    .join("/");
}

/** Re-encodes each detection to JPEG and uploads it; returns the written paths in detection order. */
export async function writeDetections(store: BlobStore, input: WriteDetectionsInput, log: Logger): Promise<string[]> {
  const { container, folder, identifier, source, detections, onlySingle } = input;

  const selected = onlySingle ? detections.slice(0, 1) : detections;
  const paths: string[] = [];
  for (let idx = 0; idx < selected.length; idx++) {
    const path = outputBlobPath(folder, identifier, source, idx);
    const jpeg = await toJpeg(decodeBase64Image(selected[idx]));
    await store.write(container, path, jpeg, "image/jpeg");
    log(`Image persisted at ${container}/${path}`);
    paths.push(path);
  }
  return paths;
}
