import { describe, expect, it, vi } from "vitest";
import { createOpenAiEmbeddingProvider } from "./embeddings.js";
import { BackendError, ConfigurationError } from "./errors.js";

function fakeClient(...vectors: number[][]) {
  const create = vi.fn(async (_body: { model: string; input: string }) => ({
    data: [{ embedding: vectors.shift() ?? [] }],
  }));
  return { create, client: { embeddings: { create } } };
}

describe("createOpenAiEmbeddingProvider", () => {
  it("requires an API key when no client is given", () => {
    expect(() => createOpenAiEmbeddingProvider({})).toThrow(ConfigurationError);
  });

  it("sends collapsed text to the configured model", async () => {
    const { create, client } = fakeClient([0.1, 0.2]);
    const provider = createOpenAiEmbeddingProvider({ client, model: "test-embed" });

    expect(await provider.embedDocument("  morning\n\tstudy  ")).toEqual([0.1, 0.2]);
    expect(create).toHaveBeenCalledWith({ model: "test-embed", input: "morning study" });
  });

  it("caps very long input", async () => {
    const { create, client } = fakeClient([1]);
    await createOpenAiEmbeddingProvider({ client }).embedQuery("a".repeat(9000));
    expect(create.mock.calls[0][0].input).toHaveLength(8000);
    expect(create.mock.calls[0][0].model).toBe("text-embedding-3-small");
  });

  it("refuses empty text without calling the API", async () => {
    const { create, client } = fakeClient([1]);
    await expect(createOpenAiEmbeddingProvider({ client }).embedQuery("   ")).rejects.toThrow(
      "embeddings: cannot embed empty text"
    );
    expect(create).not.toHaveBeenCalled();
  });

  it("wraps API failures as backend errors", async () => {
    const { create, client } = fakeClient();
    create.mockRejectedValueOnce(new Error("429 rate limited"));
    const failure = createOpenAiEmbeddingProvider({ client }).embedDocument("hi");
    await expect(failure).rejects.toBeInstanceOf(BackendError);
    await expect(failure).rejects.toThrow("embeddings: 429 rate limited");
  });

  it("rejects an empty vector and a change of dimensions", async () => {
    const { client } = fakeClient([], [1, 2], [1, 2, 3]);
    const provider = createOpenAiEmbeddingProvider({ client });

    await expect(provider.embedDocument("a")).rejects.toThrow("embeddings: no embedding returned for document");
    expect(await provider.embedDocument("b")).toEqual([1, 2]);
    await expect(provider.embedQuery("c")).rejects.toThrow("embeddings: expected 2 dimensions, got 3");
  });
});
