// shared/detection.ts
import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import type { Logger } from "@azure/functions";
import { z } from "zod";
import type { DetectionConfig } from "./config";
import { callWithRetry } from "./retry";

const detectionResponseSchema = z.object({
  response: z.object({
    extractedImages: z.array(z.string())
  })
});

/** A transient status from the detector; retried, then degraded to no detections. */
export class DetectionStatusError extends Error {
  constructor(readonly status: number) {
    super(`Detection endpoint answered ${status}`);
    this.name = "DetectionStatusError";
  }
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || (status >= 500 && status < 600);
}

/**
 * Client for the object-detection service. It takes an image as multipart
 * field `file` and answers with the crops as base64 strings.
 */
export class DetectionClient {
  private readonly client: AxiosInstance;

  constructor(private readonly config: DetectionConfig, private readonly log: Logger, client?: AxiosInstance) {
    this.client = client ?? axios.create({ timeout: config.timeoutMs });
  }

  async detect(image: Buffer, fileName: string): Promise<string[]> {
    const response = await this.post(image, fileName);
    if (response === null) return [];

    if (response.status !== 200) {
      this.log.warn(`Detection endpoint answered ${response.status}; no detections for ${fileName}`);
      return [];
    }
    const parsed = detectionResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      this.log.warn(`Unexpected detection response for ${fileName}: ${parsed.error.message}`);
      return [];
    }
    const detections = parsed.data.response.extractedImages;
    this.log(`Detector returned ${detections.length} detection(s) for ${fileName}`);
    return detections;
  }

  private async post(image: Buffer, fileName: string): Promise<AxiosResponse<unknown> | null> {
    try {
      return await callWithRetry(async () => {
        const form = new FormData();
        form.append("file", new Blob([image]), fileName);
        const r = await this.client.post<unknown>(this.config.endpoint, form, { validateStatus: () => true });
        if (isTransientStatus(r.status)) throw new DetectionStatusError(r.status);
        return r;
      }, "detect", { maxRetries: this.config.maxRetries, baseBackoffMs: this.config.backoffMs }, this.log);
    } catch (err) {
      if (err instanceof DetectionStatusError) {
        this.log.warn(`${err.message} after ${this.config.maxRetries} attempt(s); no detections for ${fileName}`);
        return null;
      }
      throw err;
    }
  }
}
