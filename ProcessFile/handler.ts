import type { Logger } from "@azure/functions";
import { HttpError, errorMessage } from "../shared/errors";
import { resolveIdentifier } from "../shared/identifier";
import { describeImage } from "../shared/imaging";
import { IptcMetadata, readIptc } from "../shared/iptc";
import { writeDetections } from "../shared/output";
import type { BlobStore } from "../shared/storage";
import { parseProcessFileQuery } from "./query";

export interface HttpResult {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface ProcessFileDeps {
  /** Opens the storage account named by a connection-string app setting. */
  openStore(connectionEnvVar: string): BlobStore;
  detect(image: Buffer, fileName: string, log: Logger): Promise<string[]>;
}

export type ProcessFileHandler = (log: Logger, query: Record<string, string | undefined>) => Promise<HttpResult>;

function json(status: number, payload: unknown): HttpResult {
  return { status, headers: { "Content-Type": "application/json" }, body: JSON.stringify(payload) };
}

function readMetadata(image: Buffer, path: string, log: Logger): IptcMetadata {
  try {
    const meta = readIptc(image);
    log(`Loaded ${meta.size} IPTC dataset(s) from ${path}`);
    return meta;
  } catch (e) {
    log.warn(`Error loading IPTC info from ${path}: ${errorMessage(e)}`);
    return IptcMetadata.empty();
  }
}

export function createProcessFileHandler(deps: ProcessFileDeps): ProcessFileHandler {
  return async (log, rawQuery) => {
    try {
      // `code` carries the function key
      const { code: _key, ...params } = rawQuery;
      log(`Params: ${JSON.stringify(params)}`);
      const parsed = parseProcessFileQuery(rawQuery);
      if (!parsed.success) {
        log.warn(`Rejected query: ${parsed.error}`);
        return json(400, { error: parsed.error });
      }
      const q = parsed.query;

      const image = await deps.openStore(q.conEnvIn).read(q.container, q.path);
      const info = await describeImage(image);
      log(`Image ${q.container}/${q.path}: ${info.format} ${info.width}x${info.height}`);
      const iptc = readMetadata(image, q.path, log);

      const identifier = resolveIdentifier({ path: q.path, idField: q.idField, folderIdIdx: q.folderIdIdx, iptc }, log);

      const fileName = q.path.split("/").pop() || q.path;
      const detections = await deps.detect(image, fileName, log);

      let outputPaths: string[] | null = null;
      if (identifier === null) {
        log.warn(`No identifier for ${q.path}; skipping ${detections.length} detection(s)`);
      } else {
        // The output store is only opened once there is something to file.
        const out = deps.openStore(q.conEnvOut);
        outputPaths = await writeDetections(out, {
          container: q.containerOut,
          folder: q.folderOut,
          identifier,
          source: q.path,
          detections,
          onlySingle: q.onlySingle
        }, log);
      }

      return json(200, {
        container: q.container,
        path: q.path,
        detections,
        identifier,
        output_paths: outputPaths
      });
    } catch (e) {
      log.error(`process_file failed: ${errorMessage(e)}`);
      if (e instanceof HttpError) return json(e.status, { error: e.message });
      return json(500, { error: errorMessage(e) });
    }
  };
}
