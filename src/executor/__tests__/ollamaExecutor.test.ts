/**
 * Unit tests for the Ollama executor with a stubbed global fetch.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { OllamaExecutor } from "../ollamaExecutor.js";
import { providerConfig } from "../../__tests__/fixtures.js";

const fetchMock = vi.fn<typeof fetch>();

function ndjson(...lines: string[]): Response {
  return new Response(lines.join("\n") + "\n", { status: 200 });
}

function requestBody(callIndex: number): Record<string, unknown> {
  return JSON.parse(String(fetchMock.mock.calls[callIndex][1]?.body));
}

const REQ = { modelId: "mistral", prompt: "Evaluate EcoTrack" };

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal("fetch", fetchMock);
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("OllamaExecutor liveness probe", () => {
  it("fails fast without a generation call when the probe is not 200", async () => {
    fetchMock.mockResolvedValueOnce(new Response("", { status: 503 }));
    const result = await new OllamaExecutor(providerConfig()).execute(REQ);

    expect(result).toMatchObject({
      status: "error",
      failure: { kind: "provider_unreachable", message: "Liveness probe returned HTTP 503" },
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(String(fetchMock.mock.calls[0][0])).toBe("http://localhost:11434/api/tags");
  });

  it("treats a refused connection as unreachable", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    const result = await new OllamaExecutor(providerConfig()).execute(REQ);

    expect(result).toMatchObject({
      status: "error",
      failure: { kind: "provider_unreachable", message: "Liveness probe failed: TypeError: fetch failed" },
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("skips the probe when disabled", async () => {
    fetchMock.mockResolvedValueOnce(ndjson('{"response":"{}","done":true}'));
    await new OllamaExecutor(providerConfig({ livenessProbe: false })).execute(REQ);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(String(fetchMock.mock.calls[0][0])).toBe("http://localhost:11434/api/generate");
  });
});

describe("OllamaExecutor generation", () => {
  it("accumulates a streamed completion and skips bad fragments", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('{"models":[]}', { status: 200 }))
      .mockResolvedValueOnce(
        ndjson(
          '{"model":"mistral","response":"{\\"score\\":","done":false}',
          "{broken",
          '{"model":"mistral","response":" 1}","done":false}',
          '{"model":"mistral","response":"","done":true}'
        )
      );
    const result = await new OllamaExecutor(providerConfig()).execute(REQ);

    expect(result).toMatchObject({ status: "ok", outputText: '{"score": 1}' });
    expect(console.warn).toHaveBeenCalledWith("[OllamaExecutor] Skipped 1 malformed fragment(s) of 4");
  });

  it("posts the model, prompt, stream flag and fixed generation options", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("{}", { status: 200 }))
      .mockResolvedValueOnce(ndjson('{"response":"{}"}'));
    await new OllamaExecutor(providerConfig()).execute(REQ);

    expect(fetchMock.mock.calls[1][1]?.method).toBe("POST");
    expect(requestBody(1)).toEqual({
      model: "mistral",
      prompt: "Evaluate EcoTrack",
      stream: true,
      options: { temperature: 0.2, num_predict: 2048, top_p: 0.9, frequency_penalty: 0 },
    });
  });

  it("sends a configured key as a bearer token", async () => {
    fetchMock.mockResolvedValueOnce(ndjson('{"response":"{}"}'));
    await new OllamaExecutor(providerConfig({ livenessProbe: false, apiKey: "test-secret" })).execute(REQ);

    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
      "content-type": "application/json",
      Authorization: "Bearer test-secret",
    });
  });

  it("reads a single-shot body when streaming is off", async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"model":"mistral","response":"{\\"a\\": 1}","done":true}'));
    const result = await new OllamaExecutor(providerConfig({ livenessProbe: false, stream: false })).execute(REQ);

    expect(result).toMatchObject({ status: "ok", outputText: '{"a": 1}' });
    expect(requestBody(0).stream).toBe(false);
  });

  it("maps 401 to a rejected credential", async () => {
    fetchMock.mockResolvedValueOnce(new Response("unauthorized", { status: 401 }));
    const result = await new OllamaExecutor(providerConfig({ livenessProbe: false })).execute(REQ);

    expect(result).toMatchObject({
      status: "error",
      failure: { kind: "provider_rejected_auth", message: "Ollama 401: unauthorized" },
    });
  });

  it("maps other non-2xx statuses to an HTTP error", async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"error":"model \\"mistral\\" not found"}', { status: 404 }));
    const result = await new OllamaExecutor(providerConfig({ livenessProbe: false })).execute(REQ);

    expect(result).toMatchObject({ status: "error", failure: { kind: "provider_http_error", status: 404 } });
  });

  it("reports an empty stream as an empty response", async () => {
    fetchMock.mockResolvedValueOnce(ndjson('{"response":"","done":true}'));
    const result = await new OllamaExecutor(providerConfig({ livenessProbe: false })).execute(REQ);

    expect(result).toMatchObject({
      status: "error",
      failure: { kind: "provider_empty_response", message: "Ollama returned no completion text" },
    });
  });

  it("includes an in-band provider error in the empty response", async () => {
    fetchMock.mockResolvedValueOnce(ndjson('{"error":"out of memory"}'));
    const result = await new OllamaExecutor(providerConfig({ livenessProbe: false })).execute(REQ);

    expect(result).toMatchObject({
      status: "error",
      failure: {
        kind: "provider_empty_response",
        message: "Ollama returned no completion text (provider error: out of memory)",
      },
    });
  });

  it("treats a timeout as unreachable", async () => {
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";
    fetchMock.mockRejectedValueOnce(timeout);
    const result = await new OllamaExecutor(providerConfig({ livenessProbe: false })).execute(REQ);

    expect(result).toMatchObject({
      status: "error",
      failure: {
        kind: "provider_unreachable",
        message: "Generation call failed: TimeoutError: The operation was aborted due to timeout",
      },
    });
  });

  it("passes an abort signal to every call", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("{}", { status: 200 }))
      .mockResolvedValueOnce(ndjson('{"response":"{}"}'));
    await new OllamaExecutor(providerConfig()).execute(REQ);

    expect(fetchMock.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
    expect(fetchMock.mock.calls[1][1]?.signal).toBeInstanceOf(AbortSignal);
  });
});
