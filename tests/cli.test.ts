import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { Command } from "commander";
import { registerCli } from "../src/cli.js";
import { Orchestrator } from "../src/orchestrator.js";
import { InMemoryBackend, captureLogs, fixedClock, testConfig, withTempDir } from "./helpers.js";

const clock = fixedClock(2026, 2, 11);

interface Harness {
  run(...args: string[]): Promise<void>;
  out: string[];
  err: string[];
}

// A fresh program per invocation, as in a real process.
function harness(dir: string, backend: InMemoryBackend | null = null): Harness {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    run: async (...args: string[]) => {
      const program = new Command();
      program.exitOverride().configureOutput({ writeOut: () => {}, writeErr: () => {} });
      registerCli(program, async () => Orchestrator.open(testConfig(dir), { backend, clock }), {
        out: (line) => out.push(line),
        err: (line) => err.push(line),
      });
      await program.parseAsync(["node", "tiered-memory", ...args]);
    },
  };
}

async function withExitCode(fn: () => Promise<void>): Promise<typeof process.exitCode> {
  const previous = process.exitCode;
  try {
    await fn();
    return process.exitCode;
  } finally {
    process.exitCode = previous;
  }
}

test("save prints the daily file it wrote", async () => {
  await withTempDir(async (dir) => {
    const cli = harness(dir);
    await cli.run("save", "We picked Postgres", "--category", "decision", "--importance", "high");
    assert.deepEqual(cli.out, [`Saved to ${path.join(dir, "2026-02-11.md")}`]);
  });
});

test("option values are validated before anything runs", async () => {
  await withTempDir(async (dir) => {
    const cli = harness(dir);
    await assert.rejects(cli.run("save", "x", "--importance", "urgent"), { code: "commander.invalidArgument" });
    await assert.rejects(harness(dir).run("consolidate", "--week-start", "2026-13-01"), {
      code: "commander.invalidArgument",
    });
    assert.deepEqual(cli.out, []);
  });
});

test("remember reports when no trigger is present", async () => {
  await withTempDir(async (dir) => {
    const cli = harness(dir);
    await cli.run("remember", "just chatting");
    assert.deepEqual(cli.out, ["No memory trigger found"]);
  });
});

test("memory errors print one line and set exit code 1", async () => {
  await withTempDir(async (dir) => {
    const cli = harness(dir);
    captureLogs();
    const code = await withExitCode(() => cli.run("validate", "Nobody Known"));
    assert.equal(code, 1);
    assert.deepEqual(cli.err, ['error: "Nobody Known" is not in quarantine']);
  });
});

test("query --files-only prints file hits with line numbers", async () => {
  await withTempDir(async (dir) => {
    await harness(dir).run("save", "Remember the Qdrant port is 6333");
    const cli = harness(dir);
    await cli.run("query", "qdrant", "--files-only", "--no-daily", "--no-weekly");
    assert.deepEqual(cli.out, [
      'Query: "qdrant" (source: files)',
      "\nMemories (1):",
      `  [file] 0.500 ${path.join(dir, "2026-02-11.md")}:6  Remember the Qdrant port is 6333`,
    ]);
  });
});

test("query --collection searches a single vector collection", async () => {
  await withTempDir(async (dir) => {
    const backend = new InMemoryBackend();
    backend.seed("mem_user", "a", "use conda for data science");
    backend.seed("mem_projects", "b", "postgres migration plan");
    const cli = harness(dir, backend);
    await cli.run("query", "conda", "--collection", "mem_projects", "--no-daily", "--no-weekly");
    assert.deepEqual(cli.out, [
      'Query: "conda" (source: vectors)',
      "\nMemories (1):",
      "  [mem_projects] 0.000  postgres migration plan",
    ]);
  });
});

test("lifecycle commands summarise what they did", async () => {
  await withTempDir(async (dir) => {
    const cli = harness(dir);
    await cli.run("consolidate", "--week-start", "2026-01-05");
    await cli.run("prune", "--retention-days", "3");
    await cli.run("quarantine-list");
    await cli.run("conflicts", "conda", "--files-only");
    assert.deepEqual(cli.out, [
      "No daily files in that week; nothing written",
      "Archived 0, kept 0, failed 0",
      "Quarantine is empty",
      "No conflicts found (source: files)",
    ]);
  });
});

test("entity commands walk a name through quarantine", async () => {
  await withTempDir(async (dir) => {
    const cli = harness(dir);
    await cli.run("quarantine", "Jane Doe", "--context", "met at the offsite");
    await cli.run("validate", "Jane Doe", "--collection", "mem_projects", "--keywords", "jane, jd");
    await cli.run("discover", "Jane Doe met Red Fox");
    assert.deepEqual(cli.out, ["Jane Doe: quarantined", "Validated Jane Doe → mem_projects", "Red Fox"]);
  });
});
