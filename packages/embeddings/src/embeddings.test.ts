import { describe, it, expect, vi, afterEach } from "vitest";
import { ExternalServiceError } from "@scholarqa/errors";
import { createEmbeddingProvider } from "./factory.js";
import { HttpEmbeddingProvider } from "./http-provider.js";

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });
}

describe("Embeddings", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("createEmbeddingProvider factory", () => {
    it("creates CohereEmbeddingProvider for type 'cohere'", () => {
      const provider = createEmbeddingProvider({
        provider: "cohere",
        cohere: { apiKey: "test-key" },
      });
      expect(provider.name).toBe("cohere");
      expect(provider.dimensions).toBe(1024);
      expect(provider.embed).toBeTypeOf("function");
      expect(provider.batchEmbed).toBeTypeOf("function");
    });

    it("creates HttpEmbeddingProvider for type 'http'", () => {
      const provider = createEmbeddingProvider({
        provider: "http",
        http: { baseUrl: "http://localhost:8080" },
      });
      expect(provider.name).toBe("http");
      expect(provider.dimensions).toBe(384);
    });

    it("respects custom dimensions", () => {
      const cohere = createEmbeddingProvider({
        provider: "cohere",
        cohere: { apiKey: "test-key", dimensions: 256 },
      });
      const http = createEmbeddingProvider({
        provider: "http",
        http: { baseUrl: "http://localhost:8080", dimensions: 768 },
      });
      expect(cohere.dimensions).toBe(256);
      expect(http.dimensions).toBe(768);
    });

    it("throws for missing cohere config", () => {
      expect(() => createEmbeddingProvider({ provider: "cohere" })).toThrow(
        "Cohere config is required",
      );
    });

    it("throws for missing http config", () => {
      expect(() => createEmbeddingProvider({ provider: "http" })).toThrow(
        "HTTP config is required",
      );
    });

    it("throws for unknown provider", () => {
      expect(() => createEmbeddingProvider({ provider: "unknown" as "cohere" })).toThrow(
        "Unknown embedding provider",
      );
    });
  });

  describe("HttpEmbeddingProvider", () => {
    it("posts the texts and returns the vectors in order", async () => {
      const fetchMock = vi.fn().mockResolvedValue(
        jsonResponse({ embeddings: [[1, 0], [0, 1]], tokens_used: 12 }),
      );
      vi.stubGlobal("fetch", fetchMock);

      const provider = new HttpEmbeddingProvider({ baseUrl: "http://embedder:8080/", dimensions: 2 });
      const result = await provider.batchEmbed(["first", "second"]);

      expect(result).toEqual({
        embeddings: [[1, 0], [0, 1]],
        model: "all-MiniLM-L6-v2",
        tokensUsed: 12,
        dimensions: 2,
      });
      expect(fetchMock).toHaveBeenCalledWith("http://embedder:8080/embed", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ texts: ["first", "second"], model: "all-MiniLM-L6-v2" }),
      });
    });

    it("embeds a query as a single-item batch", async () => {
      const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ embeddings: [[0.5, 0.5]] }));
      vi.stubGlobal("fetch", fetchMock);

      const provider = new HttpEmbeddingProvider({ baseUrl: "http://embedder:8080" });
      const result = await provider.embed("what is a ribosome?");

      expect(result.embeddings).toEqual([[0.5, 0.5]]);
      expect(result.tokensUsed).toBe(0);
    });

    it("passes the abort signal to fetch", async () => {
      const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ embeddings: [[0.5, 0.5]] }));
      vi.stubGlobal("fetch", fetchMock);
      const controller = new AbortController();

      const provider = new HttpEmbeddingProvider({ baseUrl: "http://embedder:8080" });
      await provider.embed("what is a ribosome?", controller.signal);

      expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({ signal: controller.signal });
    });

    it("skips the request for an empty batch", async () => {
      const fetchMock = vi.fn();
      vi.stubGlobal("fetch", fetchMock);

      const provider = new HttpEmbeddingProvider({ baseUrl: "http://embedder:8080" });
      const result = await provider.batchEmbed([]);

      expect(result.embeddings).toEqual([]);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("throws ExternalServiceError on a failed response", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockResolvedValue(new Response("boom", { status: 503, statusText: "Unavailable" })),
      );

      const provider = new HttpEmbeddingProvider({ baseUrl: "http://embedder:8080" });

      await expect(provider.batchEmbed(["x"])).rejects.toThrow(ExternalServiceError);
      await expect(provider.batchEmbed(["x"])).rejects.toThrow(
        "Embedding request failed: 503 Unavailable",
      );
    });

    it("rejects a response with the wrong number of vectors", async () => {
      vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ embeddings: [[1, 2]] })));

      const provider = new HttpEmbeddingProvider({ baseUrl: "http://embedder:8080" });

      await expect(provider.batchEmbed(["a", "b"])).rejects.toThrow(
        "Embedding server returned 1 vectors for 2 texts",
      );
    });

    it("reports health from the /health endpoint", async () => {
      vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("ok", { status: 200 })));
      const healthy = new HttpEmbeddingProvider({ baseUrl: "http://embedder:8080" });
      expect(await healthy.healthCheck()).toBe(true);

      vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));
      expect(await healthy.healthCheck()).toBe(false);
    });
  });
});
