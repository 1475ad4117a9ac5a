import { z } from "zod";
import { DEFAULT_CONNECTION_ENV } from "../shared/config";

export const MISSING_REQUIRED = "Missing required query parameters. Expected: container, path.";

// Data Factory sends unset pipeline parameters as empty strings.
const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const required = z.preprocess(blankToUndefined, z.string({ required_error: MISSING_REQUIRED, invalid_type_error: MISSING_REQUIRED }));
const optional = z.preprocess(blankToUndefined, z.string().optional());

const processFileQuerySchema = z.object({
  container: required,
  path: required,
  id_field: optional,
  folder_id_idx: z.preprocess(
    blankToUndefined,
    z.string().regex(/^-?\d+$/, "folder_id_idx must be an integer").transform(Number).optional()
  ),
  con_env_in: optional,
  con_env_out: optional,
  folder_out: optional,
  container_out: optional,
  only_single: z.preprocess(
    blankToUndefined,
    z.string().regex(/^(true|false|1|0|yes|no)$/i, "only_single must be true or false").optional()
  ).transform(v => v !== undefined && /^(true|1|yes)$/i.test(v))
});

export interface ProcessFileQuery {
  container: string;
  path: string;
  idField?: string;
  folderIdIdx?: number;
  conEnvIn: string;
  conEnvOut: string;
  folderOut: string;
  containerOut: string;
  onlySingle: boolean;
}

export type QueryResult =
  | { success: true; query: ProcessFileQuery }
  | { success: false; error: string };

export function parseProcessFileQuery(raw: Record<string, string | undefined>): QueryResult {
  const parsed = processFileQuerySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues;
    const missing = issues.find(i => i.message === MISSING_REQUIRED);
    return { success: false, error: (missing ?? issues[0]).message };
  }

  const q = parsed.data;
  const conEnvIn = q.con_env_in ?? DEFAULT_CONNECTION_ENV;
  return {
    success: true,
    query: {
      container: q.container,
      path: q.path,
      idField: q.id_field,
      folderIdIdx: q.folder_id_idx,
      conEnvIn,
      conEnvOut: q.con_env_out ?? conEnvIn,
      folderOut: q.folder_out ?? "",
      containerOut: q.container_out ?? q.container,
      onlySingle: q.only_single
    }
  };
}
