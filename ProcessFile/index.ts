import { AzureFunction, Context, HttpRequest } from "@azure/functions";
import { loadDetectionConfig } from "../shared/config";
import { DetectionClient } from "../shared/detection";
import { blobStoreFromEnv } from "../shared/storage";
import { createProcessFileHandler } from "./handler";

const processFile = createProcessFileHandler({
  openStore: (envVar) => blobStoreFromEnv(envVar),
  detect: (image, fileName, log) => new DetectionClient(loadDetectionConfig(), log).detect(image, fileName)
});

// GET /api/process_file?container=..&path=..&id_field=..&folder_id_idx=..&con_env_in=..&con_env_out=..&folder_out=..&container_out=..&only_single=..
const httpTrigger: AzureFunction = async function (context: Context, req: HttpRequest): Promise<void> {
  context.res = await processFile(context.log, req.query);
};

export default httpTrigger;
