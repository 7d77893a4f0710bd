import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors.js";
import type { ChunkMetadata } from "../src/rag/types.js";
import { collectionName, parseCollectionFile, VectorStore } from "../src/rag/vectorStore.js";

function meta(index: number): ChunkMetadata {
  return {
    game: "elden_ring",
    content_type: "wiki",
    url: `https://wiki.example/${index}`,
    title: `Page ${index}`,
    description: "",
    chunk_index: 0,
    total_chunks: 1,
  };
}

describe("VectorStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "vectors-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function openStore(model = "test-model", dim = 2): VectorStore {
    return new VectorStore({ directory: dir, dim, model });
  }

  async function seed(store: VectorStore) {
    const collection = await store.getOrCreateCollection("elden_ring", "wiki");
    await collection.add({
      ids: ["a", "b"],
      documents: ["first", "second"],
      metadatas: [meta(1), meta(2)],
      embeddings: [
        [1, 0],
        [0, 1],
      ],
    });
    return collection;
  }

  it("keeps every record when adds overlap", async () => {
    const store = openStore();
    const collection = await store.getOrCreateCollection("elden_ring", "wiki");
    const results = await Promise.allSettled([
      collection.add({ ids: ["a"], documents: ["first"], metadatas: [meta(1)], embeddings: [[1, 0]] }),
      collection.add({ ids: ["b"], documents: ["second"], metadatas: [meta(2)], embeddings: [[0, 1]] }),
    ]);
    expect(results.map((result) => result.status)).toEqual(["fulfilled", "fulfilled"]);

    const reloaded = await openStore().getCollection("elden_ring_wiki");
    expect(reloaded?.count()).toBe(2);
  });

  it("deletes a collection after its pending write", async () => {
    const store = openStore();
    const collection = await store.getOrCreateCollection("elden_ring", "wiki");
    const write = collection.add({ ids: ["a"], documents: ["first"], metadatas: [meta(1)], embeddings: [[1, 0]] });
    const removed = store.deleteCollection("elden_ring_wiki");
    await write;
    expect(await removed).toBe(true);
    expect(fs.existsSync(path.join(dir, "elden_ring_wiki.json"))).toBe(false);
  });

  it("names collections after game and content type", () => {
    expect(collectionName("elden_ring", "forum")).toBe("elden_ring_forum");
  });

  it("returns the nearest records first", async () => {
    const collection = await seed(openStore());
    const hits = collection.query([0.9, 0.1], 2);
    expect(hits.map((hit) => hit.id)).toEqual(["a", "b"]);
    expect(collection.query([0, 1], 1)).toEqual([
      { id: "b", document: "second", metadata: meta(2), distance: 0 },
    ]);
  });

  it("persists collections to disk", async () => {
    await seed(openStore());
    expect(fs.existsSync(path.join(dir, "elden_ring_wiki.json"))).toBe(true);

    const reopened = await openStore().getCollection("elden_ring_wiki");
    expect(reopened?.count()).toBe(2);
    expect(reopened?.metadata).toEqual({ game: "elden_ring", contentType: "wiki" });
  });

  it("ignores collections built with another embedding model", async () => {
    await seed(openStore());
    expect(await openStore("other-model").getCollection("elden_ring_wiki")).toBeNull();
  });

  it("replaces records that share an id", async () => {
    const collection = await seed(openStore());
    await collection.add({ ids: ["a"], documents: ["updated"], metadatas: [meta(1)], embeddings: [[1, 0]] });
    expect(collection.count()).toBe(2);
    expect(collection.query([1, 0], 1)[0]?.document).toBe("updated");
  });

  it("rejects inputs of mismatched length or dimension", async () => {
    const collection = await openStore().getOrCreateCollection("elden_ring", "wiki");
    await expect(
      collection.add({ ids: ["a"], documents: [], metadatas: [meta(1)], embeddings: [[1, 0]] }),
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      collection.add({ ids: ["a"], documents: ["x"], metadatas: [meta(1)], embeddings: [[1, 0, 0]] }),
    ).rejects.toMatchObject({ path: "$.embeddings[0]" });
  });

  it("lists and deletes collections", async () => {
    const store = openStore();
    await seed(store);
    await store.getOrCreateCollection("dark_souls_3", "forum");

    expect((await store.listCollections()).map((collection) => collection.name)).toEqual([
      "dark_souls_3_forum",
      "elden_ring_wiki",
    ]);

    expect(await store.deleteCollection("elden_ring_wiki")).toBe(true);
    expect(await store.getCollection("elden_ring_wiki")).toBeNull();
    expect(await store.deleteCollection("never_created")).toBe(false);
  });

  it("clears a collection in place", async () => {
    const collection = await seed(openStore());
    await collection.clear();
    expect(collection.count()).toBe(0);
    expect((await openStore().getCollection("elden_ring_wiki"))?.count()).toBe(0);
  });
});

describe("parseCollectionFile", () => {
  it("rejects files with an unexpected layout", () => {
    expect(parseCollectionFile({ name: "x", dim: 2, model: "m", metadata: { game: "g", contentType: "blog" }, records: [] })).toBeNull();
    expect(parseCollectionFile([])).toBeNull();
  });

  it("rejects records with non-numeric embeddings", () => {
    const file = {
      name: "g_wiki",
      dim: 2,
      model: "m",
      metadata: { game: "g", contentType: "wiki" },
      records: [{ id: "a", document: "d", embedding: [1, "x"], metadata: meta(1) }],
    };
    expect(parseCollectionFile(file)).toBeNull();
  });
});
