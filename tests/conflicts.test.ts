import test from "node:test";
import assert from "node:assert/strict";
import { ConflictDetector, conflictQuestion, findConflicts } from "../src/conflicts.js";
import { TrackingLedger } from "../src/ledger.js";
import { RetrievalRouter } from "../src/retrieval.js";
import { TieredStore } from "../src/storage.js";
import type { VectorHit } from "../src/types.js";
import { entry, fixedClock, withTempDir } from "./helpers.js";

function hit(content: string, collection = "mem_user", score = 0.9): VectorHit {
  return { content, collection, score };
}

const CONDA = hit("use conda for data science", "mem_user", 0.91);
const VENV = hit("prefer venv instead of conda", "mem_projects", 0.84);
const POETRY = hit("we really should use poetry instead, it is much better than anything else we tried");

test("two memories sharing contradiction vocabulary make one ASK_USER conflict", () => {
  assert.deepEqual(findConflicts([CONDA, VENV]), [
    {
      memory_1: "use conda for data science",
      memory_2: "prefer venv instead of conda",
      collection_1: "mem_user",
      collection_2: "mem_projects",
      score_1: 0.91,
      score_2: 0.84,
      conflict_type: "contradiction",
      resolution: "ASK_USER",
    },
  ]);
});

test("fewer than two memories, identical texts or disjoint vocabulary give nothing", () => {
  assert.deepEqual(findConflicts([]), []);
  assert.deepEqual(findConflicts([CONDA]), []);
  assert.deepEqual(findConflicts([CONDA, hit("USE CONDA FOR DATA SCIENCE")]), []);
  assert.deepEqual(findConflicts([hit("deploy on fridays"), hit("tabs over spaces")]), []);
});

test("the question quotes the pair with the shortest previews", () => {
  const conflicts = findConflicts([POETRY, CONDA, VENV]);
  assert.equal(conflicts.length, 3);
  assert.equal(
    conflictQuestion(conflicts),
    [
      "Memory conflict detected",
      "",
      "These memories may contradict each other:",
      "",
      'Memory A: "use conda for data science..."',
      'Memory B: "prefer venv instead of conda..."',
      "",
      'Are these separate contexts (e.g. "X in context A, Y in context B"), or should the newer one replace your earlier preference?',
    ].join("\n"),
  );
  assert.equal(conflictQuestion([]), null);
});

test("quoted previews are cut to 100 characters", () => {
  const long = "use " + "a".repeat(150);
  const question = conflictQuestion(findConflicts([hit(long), CONDA]));
  assert.ok(question?.includes(`Memory A: "${long.slice(0, 100)}..."`));
});

test("detect runs over the fallback when forced", async () => {
  await withTempDir(async (dir) => {
    const clock = fixedClock(2026, 2, 11);
    const ledger = TrackingLedger.inMemory(TrackingLedger.ledgerPath(dir));
    const store = new TieredStore({ memoryDir: dir, ledger, clock });
    await store.appendMany([
      entry("We use conda for every data science project going forward", "2026-02-09T09:00:00.000+01:00"),
      entry("Actually prefer venv instead of conda for data science work now", "2026-02-10T09:00:00.000+01:00"),
    ]);
    const router = new RetrievalRouter({
      store,
      ledger,
      clock,
      backend: null,
      collections: [],
      timeoutMs: 1000,
      defaults: { limit: 10, windowDays: 7 },
    });

    const report = await new ConflictDetector(router).detect("conda", 10, { forceFallback: true });
    assert.equal(report.source, "files");
    assert.equal(report.conflicts.length, 1);
    assert.equal(report.conflicts[0].collection_1, "file");
    assert.equal(report.conflicts[0].resolution, "ASK_USER");
    assert.ok(report.question?.startsWith("Memory conflict detected\n"));
  });
});
