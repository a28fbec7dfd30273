import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { Indexer } from "../src/indexer.js";
import { TrackingLedger } from "../src/ledger.js";
import { TieredStore } from "../src/storage.js";
import { toLocalIsoString } from "../src/dates.js";
import { pointIdFor } from "../src/vector-backend.js";
import { InMemoryBackend, captureLogs, entry, fixedClock, withTempDir } from "./helpers.js";

const clock = fixedClock(2026, 2, 11);

const COLLECTIONS = {
  mem_projects: { description: "", keywords: ["project"] },
  mem_sessions: { description: "", keywords: ["session"] },
};

function setup(dir: string, backend: InMemoryBackend, ledger = TrackingLedger.inMemory(TrackingLedger.ledgerPath(dir))) {
  const store = new TieredStore({ memoryDir: dir, ledger, clock });
  const indexer = new Indexer({
    memoryDir: dir,
    ledger,
    clock,
    store,
    backend,
    collections: COLLECTIONS,
    fallbackCollection: "mem_sessions",
  });
  return { indexer, store, ledger };
}

async function writeTiers(dir: string, store: TieredStore): Promise<void> {
  await store.append(entry("The project kickoff went well", "2026-02-10T09:00:00.000+01:00"));
  await mkdir(path.join(dir, "distilled"));
  await writeFile(path.join(dir, "distilled", "Week_2026-02-02.md"), "weekly notes\n", "utf-8");
  await mkdir(path.join(dir, "entities", "_quarantine"), { recursive: true });
  await writeFile(path.join(dir, "entities", "jane_doe.md"), "# Jane Doe (VALIDATED)\n", "utf-8");
  await writeFile(path.join(dir, "entities", "_quarantine", "bob.md"), "# Bob (IN QUARANTINE)\n", "utf-8");
}

test("routeCollection ignores role lines and falls back when nothing matches", () => {
  const backend = new InMemoryBackend();
  const indexer = new Indexer({
    memoryDir: "/unused",
    ledger: TrackingLedger.inMemory("/unused/ledger.json"),
    clock,
    store: new TieredStore({ memoryDir: "/unused", ledger: TrackingLedger.inMemory("/unused/ledger.json"), clock }),
    backend,
    collections: { mem_user: { description: "", keywords: ["user"] } },
    fallbackCollection: "mem_sessions",
  });
  assert.equal(indexer.routeCollection("*user · 2026-02-10T09:00:00.000+01:00*\n\nhello", "2026-02-10"), "mem_sessions");
  assert.equal(indexer.routeCollection("the user wants dark mode", "2026-02-10"), "mem_user");
});

test("indexAll embeds every tier file once, skipping the quarantine", async () => {
  await withTempDir(async (dir) => {
    const backend = new InMemoryBackend();
    const { indexer, store, ledger } = setup(dir, backend);
    await writeTiers(dir, store);

    assert.deepEqual(await indexer.indexAll(), { indexed: 3, skipped: 0, failed: 0, chunks: 3 });
    assert.deepEqual(backend.ensured, ["mem_projects", "mem_sessions"]);
    assert.equal(backend.collections.get("mem_sessions")?.size, 2);

    const daily = await readFile(path.join(dir, "2026-02-10.md"), "utf-8");
    const point = backend.collections.get("mem_projects")?.get(pointIdFor("2026-02-10.md#0"));
    assert.deepEqual(point?.payload, {
      content: daily.trim(),
      chunk_index: 0,
      total_chunks: 1,
      tier: "daily",
      collection: "mem_projects",
      timestamp: toLocalIsoString(clock()),
      source_file: "2026-02-10.md",
      date: "2026-02-10",
    });
    assert.equal(typeof ledger.indexedHash("entities/jane_doe.md"), "string");
    assert.equal(ledger.indexedHash("entities/_quarantine/bob.md"), undefined);
  });
});

test("unchanged files are skipped unless forced", async () => {
  await withTempDir(async (dir) => {
    const backend = new InMemoryBackend();
    const { indexer, store } = setup(dir, backend);
    await writeTiers(dir, store);
    await indexer.indexAll();
    assert.equal(backend.embedCalls, 3);

    assert.deepEqual(await indexer.indexAll(), { indexed: 0, skipped: 3, failed: 0, chunks: 0 });
    assert.equal(backend.embedCalls, 3);

    await store.append(entry("Another project note", "2026-02-10T10:00:00.000+01:00"));
    assert.deepEqual(await indexer.indexAll(), { indexed: 1, skipped: 2, failed: 0, chunks: 1 });

    assert.deepEqual(await indexer.indexAll({ force: true }), { indexed: 3, skipped: 0, failed: 0, chunks: 3 });
    assert.equal(backend.collections.get("mem_projects")?.size, 1);
  });
});

test("per-file failures are counted and leave the file unrecorded", async () => {
  await withTempDir(async (dir) => {
    const backend = new InMemoryBackend();
    backend.failingCollections.add("mem_sessions");
    const { indexer, store, ledger } = setup(dir, backend);
    await writeTiers(dir, store);

    const logs = captureLogs();
    assert.deepEqual(await indexer.indexAll(), { indexed: 1, skipped: 0, failed: 2, chunks: 1 });
    assert.equal(logs.warn.length, 2);
    assert.equal(ledger.indexedHash("distilled/Week_2026-02-02.md"), undefined);
  });
});

test("an archived file is not embedded again under its new path", async () => {
  await withTempDir(async (dir) => {
    const backend = new InMemoryBackend();
    const { indexer, store, ledger } = setup(dir, backend);
    await store.append(entry("Retro notes for the billing project", "2026-01-20T09:00:00.000+01:00"));
    assert.deepEqual(await indexer.indexAll(), { indexed: 1, skipped: 0, failed: 0, chunks: 1 });
    const hash = ledger.indexedHash("2026-01-20.md");

    assert.deepEqual(await store.prune(7), { pruned: 1, kept: 0, failed: 0 });
    assert.equal(ledger.indexedHash("2026-01-20.md"), undefined);
    assert.equal(ledger.indexedHash("archive/2026-01-20.md"), hash);

    assert.deepEqual(await indexer.indexAll(), { indexed: 0, skipped: 1, failed: 0, chunks: 0 });
    assert.equal(backend.collections.get("mem_projects")?.size, 1);
    assert.equal(backend.embedCalls, 1);
  });
});
