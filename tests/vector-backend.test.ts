import test from "node:test";
import assert from "node:assert/strict";
import { BackendUnavailableError, MalformedRecordError } from "../src/errors.js";
import type { MemoryPayload } from "../src/schemas.js";
import { QdrantBackend, pointIdFor, type Embedder } from "../src/vector-backend.js";
import { captureLogs } from "./helpers.js";

interface RecordedCall {
  url: string;
  method: string | undefined;
  body: unknown;
}

type Responder = (call: RecordedCall) => Response;

function fakeFetch(respond: Responder): { fetchImpl: typeof fetch; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const call: RecordedCall = {
      url: String(input),
      method: init?.method,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    };
    calls.push(call);
    return respond(call);
  };
  return { fetchImpl, calls };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

const embedder: Embedder = { embed: async (text) => [text.length, 1, 0, 0] };

const PAYLOAD: MemoryPayload = {
  content: "use conda for data science",
  chunk_index: 0,
  total_chunks: 1,
  tier: "daily",
  collection: "mem_user",
  timestamp: "2026-02-09T09:00:00.000+01:00",
  source_file: "2026-02-09.md",
  date: "2026-02-09",
};

function backend(respond: Responder): { qdrant: QdrantBackend; calls: RecordedCall[] } {
  const { fetchImpl, calls } = fakeFetch(respond);
  return { qdrant: new QdrantBackend(embedder, { url: "http://qdrant.test", timeoutMs: 1000, dimensions: 4, fetchImpl }), calls };
}

test("pointIdFor is a stable UUID-shaped id", () => {
  const id = pointIdFor("2026-02-09.md#0");
  assert.match(id, /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  assert.equal(pointIdFor("2026-02-09.md#0"), id);
  assert.notEqual(pointIdFor("2026-02-09.md#1"), id);
});

test("embed delegates to the embedder", async () => {
  const { qdrant, calls } = backend(() => json({}));
  assert.deepEqual(await qdrant.embed("abc"), [3, 1, 0, 0]);
  assert.equal(calls.length, 0);
});

test("ensureCollection creates a missing collection with cosine distance", async () => {
  const { qdrant, calls } = backend((call) => (call.method === "GET" ? json({ status: "not found" }, 404) : json({ result: true })));
  await qdrant.ensureCollection("mem_user");
  assert.deepEqual(calls, [
    { url: "http://qdrant.test/collections/mem_user", method: "GET", body: undefined },
    { url: "http://qdrant.test/collections/mem_user", method: "PUT", body: { vectors: { size: 4, distance: "Cosine" } } },
  ]);
});

test("ensureCollection leaves an existing collection alone and surfaces server errors", async () => {
  const existing = backend(() => json({ result: {} }));
  await existing.qdrant.ensureCollection("mem_user");
  assert.equal(existing.calls.length, 1);

  const broken = backend(() => json({}, 500));
  await assert.rejects(broken.qdrant.ensureCollection("mem_user"), {
    name: "BackendUnavailableError",
    message: "GET collection mem_user → HTTP 500",
  });
});

test("upsert writes one point and waits for it", async () => {
  const { qdrant, calls } = backend(() => json({ result: { status: "completed" } }));
  await qdrant.upsert("mem_user", "id-1", [1, 0, 0, 0], PAYLOAD);
  assert.deepEqual(calls, [
    {
      url: "http://qdrant.test/collections/mem_user/points?wait=true",
      method: "PUT",
      body: { points: [{ id: "id-1", vector: [1, 0, 0, 0], payload: PAYLOAD }] },
    },
  ]);
});

test("upsert refuses a payload outside the memory schema", async () => {
  const { qdrant, calls } = backend(() => json({}));
  await assert.rejects(qdrant.upsert("mem_user", "id-1", [1, 0, 0, 0], { ...PAYLOAD, total_chunks: 0 }), MalformedRecordError);
  assert.equal(calls.length, 0);
});

test("querySimilar keeps well-formed payloads and skips the rest", async () => {
  const { qdrant, calls } = backend(() =>
    json({
      result: [
        { id: "a", score: 0.9, payload: PAYLOAD },
        { id: 7, score: 0.4, payload: { text: "legacy shape" } },
      ],
    }),
  );
  const logs = captureLogs();
  const points = await qdrant.querySimilar("mem_user", [1, 0, 0, 0], 5);

  assert.deepEqual(points, [{ id: "a", score: 0.9, payload: PAYLOAD }]);
  assert.deepEqual(calls[0].body, { vector: [1, 0, 0, 0], limit: 5, with_payload: true });
  assert.equal(calls[0].url, "http://qdrant.test/collections/mem_user/points/search");
  assert.deepEqual(logs.warn, [
    "[tiered-memory] skipping point 7 in mem_user: payload does not match the memory schema",
  ]);
});

test("getCollectionStats reads points_count", async () => {
  assert.equal(await backend(() => json({ result: { points_count: 12 } })).qdrant.getCollectionStats("mem_user"), 12);
  assert.equal(await backend(() => json({ result: { points_count: null } })).qdrant.getCollectionStats("mem_user"), 0);
});

test("transport failures become BackendUnavailableError", async () => {
  const fetchImpl: typeof fetch = async () => {
    throw new TypeError("fetch failed");
  };
  const qdrant = new QdrantBackend(embedder, { url: "http://qdrant.test", timeoutMs: 1000, dimensions: 4, fetchImpl });
  await assert.rejects(qdrant.querySimilar("mem_user", [1], 3), (err: unknown) => {
    assert.ok(err instanceof BackendUnavailableError);
    assert.equal(err.message, "POST /collections/mem_user/points/search failed: fetch failed");
    return true;
  });
});
