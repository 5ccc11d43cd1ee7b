import * as fs from "fs/promises";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { scanCoverage } from "@/core/scanner/scanner.js";
import { GenerationError, WriteError } from "@/lib/errors.js";
import { dispatchTestGeneration, testClassName } from "@/testgen/dispatch.js";
import { renderClassMetadata } from "@/testgen/metadata.js";

import {
  addFiles,
  createTestUnit,
  createTree,
  listFiles,
  removeTree,
  scenarioAFiles,
} from "../fixtures/apex-tree.js";

import type { CoverageReport } from "@/core/scanner/types.js";
import type { TestGenerator } from "@/testgen/generator.js";

async function scan(root: string): Promise<CoverageReport> {
  const result = await scanCoverage(root);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

const succeed: TestGenerator = async (request) => ({
  kind: "success",
  content: `@isTest\nprivate class ${request.testClassName} {}`,
});

describe("testClassName", () => {
  it("appends the report's suffix", () => {
    expect(testClassName(createTestUnit("Foo"), { testSuffix: "Test" })).toBe("FooTest");
  });
});

describe("dispatchTestGeneration", () => {
  let root: string;

  beforeEach(async () => {
    root = await createTree(scenarioAFiles());
  });

  afterEach(async () => {
    await removeTree(root);
  });

  it("writes each test class with its sidecar", async () => {
    const report = await scan(root);

    const summary = await dispatchTestGeneration(report, succeed);

    expect(summary).toMatchObject({ generated: 2, failed: 0, skipped: 0, aborted: false });
    expect(await listFiles(root)).toEqual([
      "classes/AccountManager.cls",
      "classes/AccountManager.cls-meta.xml",
      "classes/AccountManagerTest.cls",
      "classes/AccountManagerTest.cls-meta.xml",
      "classes/ContactService.cls",
      "classes/ContactService.cls-meta.xml",
      "classes/ContactServiceTest.cls",
      "classes/ContactServiceTest.cls-meta.xml",
    ]);
    expect(await fs.readFile(path.join(root, "classes", "AccountManagerTest.cls"), "utf-8")).toBe(
      "@isTest\nprivate class AccountManagerTest {}\n"
    );
    expect(await fs.readFile(path.join(root, "classes", "AccountManagerTest.cls-meta.xml"), "utf-8")).toBe(
      renderClassMetadata("59.0")
    );

    const rescan = await scan(root);
    expect(rescan.percentage).toBe(100);
  });

  it("writes the configured API version", async () => {
    const report = await scan(root);

    await dispatchTestGeneration(report, succeed, { apiVersion: "61.0" });

    const sidecar = await fs.readFile(path.join(root, "classes", "ContactServiceTest.cls-meta.xml"), "utf-8");
    expect(sidecar).toBe(renderClassMetadata("61.0"));
  });

  it("leaves no file behind for a failed class and keeps it uncovered", async () => {
    const report = await scan(root);
    const generator: TestGenerator = async (request) =>
      request.unit.name === "AccountManager"
        ? { kind: "failure", reason: "model refused" }
        : succeed(request, new AbortController().signal);

    const summary = await dispatchTestGeneration(report, generator);

    expect(summary).toMatchObject({ generated: 1, failed: 1, skipped: 0 });
    const failed = summary.outcomes[0];
    expect(failed?.status).toBe("failed");
    if (failed?.status === "failed") {
      expect(failed.unit.name).toBe("AccountManager");
      expect(failed.error).toBeInstanceOf(GenerationError);
      expect(failed.error.message).toBe("Generation failed for AccountManager: model refused");
    }

    const files = await listFiles(root);
    expect(files.filter((f) => f.endsWith("AccountManagerTest.cls"))).toEqual([]);
    expect(files).not.toContain("classes/AccountManagerTest.cls-meta.xml");

    const rescan = await scan(root);
    expect(rescan.uncovered.map((u) => u.name)).toEqual(["AccountManager"]);
  });

  it("treats whitespace-only content as a failure", async () => {
    const report = await scan(root);

    const summary = await dispatchTestGeneration(report, async () => ({ kind: "success", content: "  \n " }));

    expect(summary.failed).toBe(2);
    const outcome = summary.outcomes[1];
    if (outcome?.status === "failed") {
      expect(outcome.error.message).toBe("Generation failed for ContactService: AI returned an empty response");
    }
    expect(await listFiles(root)).toEqual(Object.keys(scenarioAFiles()).sort());
  });

  it("records a thrown generator error against its unit only", async () => {
    const report = await scan(root);
    const generator: TestGenerator = async (request) => {
      if (request.unit.name === "ContactService") {
        throw new Error("socket hang up");
      }
      return succeed(request, new AbortController().signal);
    };

    const summary = await dispatchTestGeneration(report, generator, { concurrency: 2 });

    expect(summary.outcomes.map((o) => o.status)).toEqual(["generated", "failed"]);
    const outcome = summary.outcomes[1];
    if (outcome?.status === "failed") {
      expect(outcome.error.message).toBe("Generation failed for ContactService: socket hang up");
    }
  });

  it("fails a unit whose generator outlives the timeout", async () => {
    const report = await scan(root);
    let sawAbort = false;
    const generator: TestGenerator = (request, signal) =>
      request.unit.name === "AccountManager"
        ? new Promise((resolve) => {
            signal.addEventListener("abort", () => {
              sawAbort = true;
              resolve({ kind: "success", content: "too late" });
            });
          })
        : succeed(request, signal);

    const summary = await dispatchTestGeneration(report, generator, { timeoutMs: 20 });

    expect(summary.outcomes.map((o) => o.status)).toEqual(["failed", "generated"]);
    const outcome = summary.outcomes[0];
    if (outcome?.status === "failed") {
      expect(outcome.error.message).toBe("Generation failed for AccountManager: timed out after 20ms");
    }
    expect(sawAbort).toBe(true);
    expect(await listFiles(root)).not.toContain("classes/AccountManagerTest.cls");
  });

  it("runs at most `concurrency` units at once", async () => {
    await addFiles(root, { "classes/Alpha.cls": "", "classes/Beta.cls": "" });
    const report = await scan(root);
    let inFlight = 0;
    let peak = 0;
    const generator: TestGenerator = async (request, signal) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 10));
      inFlight--;
      return succeed(request, signal);
    };

    const summary = await dispatchTestGeneration(report, generator, { concurrency: 2 });

    expect(summary.generated).toBe(4);
    expect(peak).toBe(2);
  });

  it("reports progress in report order", async () => {
    const report = await scan(root);
    const started: string[] = [];
    const completed: string[] = [];

    await dispatchTestGeneration(report, succeed, {
      onUnitStart: (unit, index, total) => started.push(`${index + 1}/${total} ${unit.name}`),
      onUnitComplete: (outcome) => completed.push(`${outcome.unit.name}:${outcome.status}`),
    });

    expect(started).toEqual(["1/2 AccountManager", "2/2 ContactService"]);
    expect(completed).toEqual(["AccountManager:generated", "ContactService:generated"]);
  });

  it("stops between units once aborted", async () => {
    const report = await scan(root);
    const controller = new AbortController();
    const generator = vi.fn(succeed);

    const summary = await dispatchTestGeneration(report, generator, {
      signal: controller.signal,
      onUnitComplete: () => controller.abort(),
    });

    expect(generator).toHaveBeenCalledTimes(1);
    expect(summary).toMatchObject({ generated: 1, failed: 0, skipped: 1, aborted: true });
    expect(summary.outcomes[1]).toMatchObject({ status: "skipped", reason: "aborted" });
    expect(await listFiles(root)).not.toContain("classes/ContactServiceTest.cls");
  });

  it("touches nothing in a dry run", async () => {
    const report = await scan(root);
    const generator = vi.fn(succeed);

    const summary = await dispatchTestGeneration(report, generator, { dryRun: true });

    expect(generator).not.toHaveBeenCalled();
    expect(summary.outcomes.map((o) => o.status === "skipped" && o.reason)).toEqual(["dry-run", "dry-run"]);
    expect(await listFiles(root)).toEqual(Object.keys(scenarioAFiles()).sort());
  });

  it("does not overwrite a test class created after the scan", async () => {
    const report = await scan(root);
    await addFiles(root, { "classes/AccountManagerTest.cls": "// hand written\n" });

    const summary = await dispatchTestGeneration(report, succeed);

    const outcome = summary.outcomes[0];
    expect(outcome?.status).toBe("failed");
    if (outcome?.status === "failed") {
      expect(outcome.error).toBeInstanceOf(WriteError);
      expect(outcome.error.message).toBe("AccountManagerTest.cls already exists");
    }
    expect(await fs.readFile(path.join(root, "classes", "AccountManagerTest.cls"), "utf-8")).toBe("// hand written\n");
  });

  it("keeps an existing sidecar and removes the test class it would have described", async () => {
    const report = await scan(root);
    await addFiles(root, { "classes/ContactServiceTest.cls-meta.xml": "<user/>\n" });

    const summary = await dispatchTestGeneration(report, succeed);

    expect(summary.outcomes.map((o) => o.status)).toEqual(["generated", "failed"]);
    const outcome = summary.outcomes[1];
    if (outcome?.status === "failed") {
      expect(outcome.error.code).toBe("WRITE_FAILED");
      expect(outcome.error.message).toBe("ContactServiceTest.cls-meta.xml already exists");
    }
    const files = await listFiles(root);
    expect(files).not.toContain("classes/ContactServiceTest.cls");
    expect(files.filter((f) => f.endsWith(".tmp"))).toEqual([]);
    expect(await fs.readFile(path.join(root, "classes", "ContactServiceTest.cls-meta.xml"), "utf-8")).toBe("<user/>\n");
  });

  it("leaves files it did not create when the test class cannot be written", async () => {
    const report = await scan(root);
    await addFiles(root, { "classes/ContactServiceTest.cls-meta.xml": "<user/>\n" });
    await fs.mkdir(path.join(root, "classes", `.ContactServiceTest.cls.${process.pid}.tmp`));

    const summary = await dispatchTestGeneration(report, succeed);

    expect(summary.outcomes.map((o) => o.status)).toEqual(["generated", "failed"]);
    const outcome = summary.outcomes[1];
    if (outcome?.status === "failed") {
      expect(outcome.error.message).toMatch(/^Could not write ContactServiceTest\.cls: EISDIR/);
    }
    const files = await listFiles(root);
    expect(files).not.toContain("classes/ContactServiceTest.cls");
    expect(await fs.readFile(path.join(root, "classes", "ContactServiceTest.cls-meta.xml"), "utf-8")).toBe("<user/>\n");
  });

  it("honours a timeout longer than setTimeout can schedule", async () => {
    const report = await scan(root);
    const slow: TestGenerator = async (request, signal) => {
      await new Promise((resolve) => setTimeout(resolve, 30));
      return succeed(request, signal);
    };

    const summary = await dispatchTestGeneration(report, slow, { timeoutMs: 3_000_000_000 });

    expect(summary).toMatchObject({ generated: 2, failed: 0 });
  });

  it("fails a unit whose source disappeared", async () => {
    const report = await scan(root);
    await fs.rm(path.join(root, "classes", "AccountManager.cls"));
    const generator = vi.fn(succeed);

    const summary = await dispatchTestGeneration(report, generator);

    const outcome = summary.outcomes[0];
    if (outcome?.status === "failed") {
      expect(outcome.error.message).toMatch(/^Could not read classes\/AccountManager\.cls: ENOENT/);
    }
    expect(summary.failed).toBe(1);
    expect(generator).toHaveBeenCalledTimes(1);
  });
});
