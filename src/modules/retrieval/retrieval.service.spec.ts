import { createRetrievalService, SNIPPET_LENGTH } from "./retrieval.service";
import { FakeEmbedder, FakeVectorIndex, MemoryDocumentStore } from "../../test/fakes";
import { UpstreamServiceError } from "../../utils/errors";
import { Embedder } from "../../types";

// Each call moves 250ms forward, so one search takes 0.25s
const steppingClock = () => {
  let current = 0;
  return () => (current += 250);
};

describe("retrieval service", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("embeds the query and asks the index for topK neighbours", async () => {
    const embedder = new FakeEmbedder();
    const index = new FakeVectorIndex();
    const retrieval = createRetrievalService({
      embedder,
      index,
      documents: new MemoryDocumentStore(),
      now: steppingClock(),
    });

    const result = await retrieval.search("refunds", 3);

    expect(embedder.queries).toEqual(["refunds"]);
    expect(index.queries).toEqual([{ vector: [7, 1], topK: 3 }]);
    expect(result).toEqual({ query: "refunds", elapsed: "0.25s", results: [] });
  });

  it("orders hits by descending score", async () => {
    const index = new FakeVectorIndex([
      { id: "low", score: 0.1, metadata: { text: "low" } },
      { id: "high", score: 0.8, metadata: { text: "high" } },
      { id: "mid", score: 0.5, metadata: { text: "mid" } },
    ]);
    const retrieval = createRetrievalService({
      embedder: new FakeEmbedder(),
      index,
      documents: new MemoryDocumentStore(),
    });

    const { results } = await retrieval.search("q", 3);

    expect(results.map((hit) => hit.id)).toEqual(["high", "mid", "low"]);
  });

  it("only consults the document store for ids without text metadata", async () => {
    const documents = new MemoryDocumentStore([{ id: "b", text: "from mongo", metadata: {} }]);
    const retrieval = createRetrievalService({
      embedder: new FakeEmbedder(),
      index: new FakeVectorIndex([
        { id: "a", score: 0.9, metadata: { text: "from metadata" } },
        { id: "b", score: 0.7, metadata: { source: "faq" } },
      ]),
      documents,
    });

    const { results } = await retrieval.search("q", 5);

    expect(documents.lookups).toEqual([["b"]]);
    expect(results).toEqual([
      { id: "a", doc: "from metadata", score: 0.9 },
      { id: "b", doc: "from mongo", score: 0.7 },
    ]);
  });

  it("skips the document store when every match carries its text", async () => {
    const documents = new MemoryDocumentStore();
    const retrieval = createRetrievalService({
      embedder: new FakeEmbedder(),
      index: new FakeVectorIndex([{ id: "a", score: 0.9, metadata: { text: "inline" } }]),
      documents,
    });

    await retrieval.search("q", 5);

    expect(documents.lookups).toEqual([]);
  });

  it("drops ids that resolve to no document", async () => {
    const retrieval = createRetrievalService({
      embedder: new FakeEmbedder(),
      index: new FakeVectorIndex([
        { id: "orphan", score: 0.95 },
        { id: "a", score: 0.6, metadata: { text: "kept" } },
      ]),
      documents: new MemoryDocumentStore(),
    });

    const { results } = await retrieval.search("q", 5);

    expect(results).toEqual([{ id: "a", doc: "kept", score: 0.6 }]);
    expect(console.warn).toHaveBeenCalledWith("[Retrieval] No document found for vector orphan; skipping");
  });

  it("cuts long documents to a snippet", async () => {
    const long = "x".repeat(SNIPPET_LENGTH + 50);
    const retrieval = createRetrievalService({
      embedder: new FakeEmbedder(),
      index: new FakeVectorIndex([{ id: "a", score: 0.9, metadata: { text: long } }]),
      documents: new MemoryDocumentStore(),
    });

    const { results } = await retrieval.search("q", 1);

    expect(results[0].doc).toHaveLength(300);
  });

  it("lets an embedding failure through untouched", async () => {
    const failure = new UpstreamServiceError("Gemini", "embedding failed");
    const embedder: Embedder = {
      embedQuery: async () => {
        throw failure;
      },
      embedDocuments: async () => [],
    };
    const index = new FakeVectorIndex();
    const retrieval = createRetrievalService({ embedder, index, documents: new MemoryDocumentStore() });

    await expect(retrieval.search("q", 5)).rejects.toBe(failure);
    expect(index.queries).toHaveLength(0);
  });
});
