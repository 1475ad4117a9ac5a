import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../shared/errors";
import { describeImage } from "../shared/imaging";
import { app13Segment, imageResource, iptcJpeg, solidJpeg, solidPng, withSegments } from "../shared/__fixtures__/images";
import { fakeLog } from "../shared/__fixtures__/log";
import { MemoryBlobStore } from "../shared/__fixtures__/store";
import { createProcessFileHandler, type HttpResult } from "./handler";

let stores: Record<string, MemoryBlobStore>;
let crops: string[];
const detect = vi.fn(async (_image: Buffer, _fileName: string) => crops);

const processFile = createProcessFileHandler({
  openStore: (envVar) => {
    const store = stores[envVar];
    if (!store) throw new ConfigurationError(`${envVar} is not set`);
    return store;
  },
  detect: (image, fileName) => detect(image, fileName)
});

function body(res: HttpResult): unknown {
  return JSON.parse(res.body);
}

beforeEach(async () => {
  stores = { STORAGE_IN: new MemoryBlobStore(), STORAGE_OUT: new MemoryBlobStore() };
  const crop = (await solidPng()).toString("base64");
  crops = [crop, crop];
  detect.mockClear();
});

describe("process_file", () => {
  it("files crops under a folder segment of the source path", async () => {
    const image = await solidJpeg();
    stores.STORAGE_IN.put("images", "raw/ACC-77/img_001.jpg", image);

    const res = await processFile(fakeLog(), {
      container: "images",
      path: "raw/ACC-77/img_001.jpg",
      id_field: "folder",
      folder_id_idx: "1",
      con_env_in: "STORAGE_IN",
      con_env_out: "STORAGE_OUT",
      folder_out: "crops",
      container_out: "results",
      only_single: "false"
    });

    expect(res.status).toBe(200);
    expect(res.headers).toEqual({ "Content-Type": "application/json" });
    expect(body(res)).toEqual({
      container: "images",
      path: "raw/ACC-77/img_001.jpg",
      detections: crops,
      identifier: "ACC-77",
      output_paths: ["crops/ACC-77/img_001_cropped_0.JPG", "crops/ACC-77/img_001_cropped_1.JPG"]
    });
    expect(detect).toHaveBeenCalledWith(image, "img_001.jpg");
    const written = stores.STORAGE_OUT.blobs.get("results/crops/ACC-77/img_001_cropped_1.JPG");
    expect(written?.contentType).toBe("image/jpeg");
    expect(written && (await describeImage(written.data)).format).toBe("jpeg");
    expect(stores.STORAGE_IN.blobs.size).toBe(1);
  });

  it("takes the identifier from IPTC metadata", async () => {
    const image = iptcJpeg(await solidJpeg(), [{ dataset: 5, value: "ACC-1042" }]);
    stores.STORAGE_IN.put("images", "a.jpg", image);

    const res = await processFile(fakeLog(), {
      container: "images", path: "a.jpg", id_field: "object name", con_env_in: "STORAGE_IN", con_env_out: "STORAGE_OUT", container_out: "results", only_single: "true"
    });

    expect(res.status).toBe(200);
    expect(body(res)).toMatchObject({ identifier: "ACC-1042", output_paths: ["ACC-1042/a_cropped_0.JPG"] });
    expect([...stores.STORAGE_OUT.blobs.keys()]).toEqual(["results/ACC-1042/a_cropped_0.JPG"]);
  });

  it("defaults the output to the input account and container", async () => {
    stores.STORAGE_IN.put("images", "x/a.jpg", await solidJpeg());

    const res = await processFile(fakeLog(), {
      container: "images", path: "x/a.jpg", id_field: "folder", folder_id_idx: "0", con_env_in: "STORAGE_IN", only_single: "1"
    });

    expect(body(res)).toMatchObject({ identifier: "x", output_paths: ["x/a_cropped_0.JPG"] });
    expect(stores.STORAGE_IN.blobs.has("images/x/a_cropped_0.JPG")).toBe(true);
  });

  it("answers without writing when there is no identifier", async () => {
    stores.STORAGE_IN.put("images", "a.jpg", await solidJpeg());
    const log = fakeLog();

    const res = await processFile(log, {
      container: "images", path: "a.jpg", id_field: "headline", con_env_in: "STORAGE_IN", con_env_out: "UNSET_SETTING"
    });

    expect(res.status).toBe(200);
    expect(body(res)).toEqual({ container: "images", path: "a.jpg", detections: crops, identifier: null, output_paths: null });
    expect(log.warn).toHaveBeenCalledWith("No identifier for a.jpg; skipping 2 detection(s)");
  });

  it("returns an empty result when nothing is detected", async () => {
    stores.STORAGE_IN.put("images", "A/a.jpg", await solidJpeg());
    crops = [];

    const res = await processFile(fakeLog(), {
      container: "images", path: "A/a.jpg", id_field: "folder", folder_id_idx: "0", con_env_in: "STORAGE_IN"
    });

    expect(body(res)).toEqual({ container: "images", path: "A/a.jpg", detections: [], identifier: "A", output_paths: [] });
  });

  it("rejects a request without container or path", async () => {
    const res = await processFile(fakeLog(), { container: "images" });

    expect(res.status).toBe(400);
    expect(body(res)).toEqual({ error: "Missing required query parameters. Expected: container, path." });
    expect(detect).not.toHaveBeenCalled();
  });

  it("rejects a folder index outside the path", async () => {
    stores.STORAGE_IN.put("images", "raw/a.jpg", await solidJpeg());

    const res = await processFile(fakeLog(), {
      container: "images", path: "raw/a.jpg", id_field: "folder", folder_id_idx: "5", con_env_in: "STORAGE_IN"
    });

    expect(res.status).toBe(400);
    expect(body(res)).toEqual({ error: 'folder_id_idx 5 is out of range for path "raw/a.jpg"' });
    expect(detect).not.toHaveBeenCalled();
  });

  it("keeps the function key out of the log", async () => {
    stores.STORAGE_IN.put("images", "a.jpg", await solidJpeg());
    const log = fakeLog();

    const res = await processFile(log, { container: "images", path: "a.jpg", con_env_in: "STORAGE_IN", code: "test-function-key" });

    expect(res.status).toBe(200);
    const lines = [log, log.info, log.warn, log.error, log.verbose].flatMap(m => m.mock.calls.flat().map(String));
    expect(lines).toContain('Params: {"container":"images","path":"a.jpg","con_env_in":"STORAGE_IN"}');
    expect(lines.filter(l => l.includes("test-function-key"))).toEqual([]);
  });

  it("carries on with empty metadata when the IPTC block is broken", async () => {
    const resource = imageResource(0x0404, Buffer.from("ACC-"));
    resource.writeUInt32BE(1000, 8);
    stores.STORAGE_IN.put("images", "a.jpg", withSegments(await solidJpeg(), app13Segment(resource)));
    const log = fakeLog();

    const res = await processFile(log, {
      container: "images", path: "a.jpg", id_field: "object name", con_env_in: "STORAGE_IN"
    });

    expect(res.status).toBe(200);
    expect(body(res)).toMatchObject({ identifier: null, output_paths: null });
    expect(log.warn).toHaveBeenCalledWith("Error loading IPTC info from a.jpg: Image resource 0x404 overruns its segment");
  });

  it("fails when the input connection setting is unset", async () => {
    const log = fakeLog();
    const res = await processFile(log, { container: "images", path: "a.jpg" });

    expect(res.status).toBe(500);
    expect(body(res)).toEqual({ error: "AzureWebJobsStorage is not set" });
    expect(log.error).toHaveBeenCalledWith("process_file failed: AzureWebJobsStorage is not set");
  });

  it("fails when the blob is missing", async () => {
    const res = await processFile(fakeLog(), { container: "images", path: "gone.jpg", con_env_in: "STORAGE_IN" });

    expect(res.status).toBe(500);
    expect(body(res)).toEqual({ error: "The specified blob does not exist: images/gone.jpg" });
  });

  it("fails when the blob is not an image", async () => {
    stores.STORAGE_IN.put("images", "notes.txt", Buffer.from("field notes"));

    const res = await processFile(fakeLog(), { container: "images", path: "notes.txt", con_env_in: "STORAGE_IN" });

    expect(res.status).toBe(500);
    expect(detect).not.toHaveBeenCalled();
  });

  it("fails when the detector cannot be reached", async () => {
    stores.STORAGE_IN.put("images", "a.jpg", await solidJpeg());
    detect.mockRejectedValueOnce(new Error("connect ECONNREFUSED 127.0.0.1:8000"));

    const res = await processFile(fakeLog(), { container: "images", path: "a.jpg", con_env_in: "STORAGE_IN" });

    expect(res.status).toBe(500);
    expect(body(res)).toEqual({ error: "connect ECONNREFUSED 127.0.0.1:8000" });
  });
});
