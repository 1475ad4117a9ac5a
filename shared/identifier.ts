// shared/identifier.ts
import type { Logger } from "@azure/functions";
import { HttpError } from "./errors";
import { tagForField, type IptcMetadata } from "./iptc";

export interface IdentifierSource {
  path: string;
  idField?: string;
  folderIdIdx?: number;
  iptc: IptcMetadata;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * `id_field=folder` takes a segment of the blob path (negative indices count
 * from the end); any other value names an IPTC field holding the identifier.
 */
export function resolveIdentifier(src: IdentifierSource, log: Logger): string | null {
  const { path, idField, folderIdIdx, iptc } = src;
  if (!idField) return null;

  if (idField === "folder") {
    if (folderIdIdx === undefined) return null;
    const segments = path.split("/");
    const segment = segments.at(folderIdIdx);
    if (segment === undefined) {
      throw new HttpError(400, `folder_id_idx ${folderIdIdx} is out of range for path "${path}"`);
    }
    return segment;
  }

  const tag = tagForField(idField);
  log(`IPTC tag for ${idField}: ${tag}`);
  if (tag === -1) return null;

  const raw = iptc.get(tag);
  if (raw === undefined) {
    log.warn(`IPTC field ${idField} (2:${tag}) not present in ${path}`);
    return null;
  }
  try {
    return utf8.decode(raw);
  } catch (e) {
    log.warn(`IPTC field ${idField} in ${path} is not valid UTF-8: ${e}`);
    return null;
  }
}
