import * as path from "path";

import { describe, it, expect, afterEach } from "vitest";

import {
  DEFAULT_SETTINGS,
  PROJECT_CONFIG_FILE,
  isProvider,
  loadProjectConfig,
  parseProjectConfig,
  resolveSettings,
} from "@/cli/project-config.js";

import { createTree, removeTree } from "../fixtures/apex-tree.js";

describe("parseProjectConfig", () => {
  it("parses known keys", () => {
    const result = parseProjectConfig("threshold: 80\nexcludeDirs: [node_modules, .sfdx]\nprovider: mock\n", "test.yml");

    expect(result).toEqual({
      success: true,
      data: { threshold: 80, excludeDirs: ["node_modules", ".sfdx"], provider: "mock" },
    });
  });

  it("treats an empty file as no settings", () => {
    expect(parseProjectConfig("", "test.yml")).toEqual({ success: true, data: {} });
    expect(parseProjectConfig("# comments only\n", "test.yml")).toEqual({ success: true, data: {} });
  });

  it("rejects unknown keys", () => {
    const result = parseProjectConfig("thresold: 80\n", "test.yml");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("CONFIG_ERROR");
      expect(result.error.message).toContain("Unrecognized key(s) in object: 'thresold'");
    }
  });

  it("rejects an out-of-range threshold with the key path", () => {
    const result = parseProjectConfig("threshold: 120\n", "test.yml");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("Invalid config in test.yml: threshold: Number must be less than or equal to 100");
    }
  });

  it("rejects a timeout setTimeout cannot schedule", () => {
    const result = parseProjectConfig("timeoutMs: 3000000000\n", "test.yml");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(
        "Invalid config in test.yml: timeoutMs: Number must be less than or equal to 2147483647"
      );
    }
  });

  it("rejects a malformed extension", () => {
    const result = parseProjectConfig("extension: cls\n", "test.yml");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("Invalid config in test.yml: extension: must look like .cls");
    }
  });

  it("reports invalid YAML", () => {
    const result = parseProjectConfig("threshold: [\n", "test.yml");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toMatch(/^Invalid YAML in test\.yml: /);
    }
  });
});

describe("loadProjectConfig", () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) {
      await removeTree(root);
      root = undefined;
    }
  });

  it("returns no settings when the default file is absent", async () => {
    root = await createTree();

    expect(await loadProjectConfig(undefined, root)).toEqual({
      success: true,
      data: { config: {}, path: undefined },
    });
  });

  it("fails when an explicit file is absent", async () => {
    root = await createTree();

    const result = await loadProjectConfig("custom.yml", root);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(`Config file not found: ${path.join(root, "custom.yml")}`);
    }
  });

  it("resolves sourceDir against the file's directory", async () => {
    root = await createTree({ [PROJECT_CONFIG_FILE]: "sourceDir: force-app/main/default\nthreshold: 90\n" });

    const result = await loadProjectConfig(undefined, root);

    expect(result).toEqual({
      success: true,
      data: {
        config: { sourceDir: path.join(root, "force-app", "main", "default"), threshold: 90 },
        path: path.join(root, PROJECT_CONFIG_FILE),
      },
    });
  });
});

describe("resolveSettings", () => {
  it("falls back to defaults", () => {
    expect(resolveSettings({})).toEqual(DEFAULT_SETTINGS);
    expect(DEFAULT_SETTINGS).toMatchObject({
      testSuffix: "Test",
      extension: ".cls",
      threshold: 75,
      requireAllCovered: true,
      apiVersion: "59.0",
      concurrency: 1,
      timeoutMs: 60000,
    });
  });

  it("prefers flags over the project file over defaults", () => {
    const settings = resolveSettings(
      { threshold: 80, testSuffix: "Spec", concurrency: 4 },
      { threshold: 60, testSuffix: undefined }
    );

    expect(settings.threshold).toBe(60);
    expect(settings.testSuffix).toBe("Spec");
    expect(settings.concurrency).toBe(4);
    expect(settings.extension).toBe(".cls");
  });

  it("keeps a false flag", () => {
    expect(resolveSettings({ requireAllCovered: true }, { requireAllCovered: false }).requireAllCovered).toBe(false);
  });

  it("uses a supplied default tier", () => {
    expect(resolveSettings({}, {}, { ...DEFAULT_SETTINGS, provider: "openai" }).provider).toBe("openai");
    expect(resolveSettings({ provider: "mock" }, {}, { ...DEFAULT_SETTINGS, provider: "openai" }).provider).toBe("mock");
  });
});

describe("isProvider", () => {
  it("accepts known providers", () => {
    expect(isProvider("anthropic")).toBe(true);
    expect(isProvider("gemini")).toBe(false);
  });
});
