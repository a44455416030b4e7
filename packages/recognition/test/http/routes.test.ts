import { afterEach, describe, it, expect } from "vitest";
import { confirmUpload } from "../../src";
import {
  CALLBACK_URL,
  createRecognitionHarness,
  type RecognitionHarness,
} from "../harness";

let harness: RecognitionHarness | undefined;
afterEach(async () => {
  await harness?.dispose();
  harness = undefined;
});

const register = (handler: (request: Request) => Promise<Response>, body: string) =>
  handler(
    new Request("http://labelflow.test/blobs", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body,
    }),
  );

const get = (handler: (request: Request) => Promise<Response>, path: string) =>
  handler(new Request(`http://labelflow.test${path}`));

const put = (handler: (request: Request) => Promise<Response>, url: string) =>
  handler(new Request(url, { method: "PUT", body: new Uint8Array([1, 2, 3]) }));

describe("blob routes", () => {
  it("registers, accepts the upload and reports the labels", async () => {
    harness = createRecognitionHarness();
    const handler = await harness.handler();

    const created = await register(handler, JSON.stringify({ callback_url: CALLBACK_URL }));
    expect(created.status).toBe(201);
    const registration: unknown = await created.json();
    if (
      typeof registration !== "object" ||
      registration === null ||
      !("blob_id" in registration) ||
      typeof registration.blob_id !== "string" ||
      !("upload_url" in registration) ||
      typeof registration.upload_url !== "string"
    ) {
      throw new Error("unexpected registration body");
    }
    const blobId = registration.blob_id;
    expect(registration).toEqual({
      blob_id: blobId,
      callback_url: CALLBACK_URL,
      upload_url: registration.upload_url,
    });

    const pending = await get(handler, `/blobs/${blobId}`);
    expect(pending.status).toBe(200);
    expect(await pending.json()).toEqual({ blob_id: blobId, status: "PENDING_UPLOAD" });

    const uploaded = await put(handler, registration.upload_url);
    expect(uploaded.status).toBe(204);

    expect(await harness.run(confirmUpload(blobId))).toBe("started");
    const labeled = await get(handler, `/blobs/${blobId}`);
    expect(await labeled.json()).toEqual({
      blob_id: blobId,
      status: "LABELED",
      labels: [
        { name: "cat", confidence: 90 },
        { name: "box", confidence: 60 },
      ],
    });
  });

  it("rejects an invalid callback url", async () => {
    harness = createRecognitionHarness();
    const handler = await harness.handler();

    const response = await register(handler, JSON.stringify({ callback_url: "nope" }));
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      description: "Invalid callback url supplied.",
      payload: { callback_url: "nope" },
    });
  });

  it("treats a missing callback url as invalid", async () => {
    harness = createRecognitionHarness();
    const handler = await harness.handler();

    const response = await register(handler, "{}");
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      description: "Invalid callback url supplied.",
      payload: { callback_url: "" },
    });
  });

  it("rejects a body that is not JSON", async () => {
    harness = createRecognitionHarness();
    const handler = await harness.handler();

    const response = await register(handler, "{");
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      description: "Invalid request body.",
      payload: {},
    });
  });

  it("answers 404 for an unknown blob", async () => {
    harness = createRecognitionHarness();
    const handler = await harness.handler();

    const response = await get(handler, "/blobs/ghost");
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      description: "Blob not found.",
      payload: { blob_id: "ghost" },
    });
  });

  it("refuses uploads with a bad or missing signature", async () => {
    harness = createRecognitionHarness();
    const handler = await harness.handler();
    const { blob_id } = await harness.register();

    const forged = await put(
      handler,
      `http://labelflow.test/uploads/${blob_id}?expires=2000000&signature=00ff`,
    );
    expect(forged.status).toBe(403);
    expect(await forged.json()).toEqual({
      description: "Upload signature is invalid",
      payload: { blob_id },
    });

    const unsigned = await put(handler, `http://labelflow.test/uploads/${blob_id}`);
    expect(unsigned.status).toBe(403);
    expect(harness.handles.storage.keys().filter((k) => k.startsWith("blobs/"))).toEqual([
      `blobs/${blob_id}`,
    ]);
  });

  it("refuses uploads after the url expired", async () => {
    harness = createRecognitionHarness();
    const handler = await harness.handler();
    const { blob_id, upload_url } = await harness.register();

    harness.time.advance(30_001);
    const response = await put(handler, upload_url);
    expect(response.status).toBe(403);
    expect(await response.json()).toEqual({
      description: "Upload URL has expired",
      payload: { blob_id },
    });
  });

  it("reports health", async () => {
    harness = createRecognitionHarness();
    const handler = await harness.handler();

    const response = await get(handler, "/health");
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok" });
  });
});
