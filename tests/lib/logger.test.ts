import { describe, it, expect, afterEach, vi } from "vitest";

import { Logger } from "@/lib/logger.js";

vi.mock("chalk", () => {
  const tag = (name: string) => (s: string): string => `[${name}]${s}[/${name}]`;
  return {
    default: { gray: tag("gray"), yellow: tag("yellow"), red: tag("red"), green: tag("green"), dim: tag("dim") },
  };
});

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes to stderr at or above its level", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const log = new Logger();
    log.configure({ level: "warn" });

    log.info("hidden");
    log.warn("careful");
    log.error("broken");

    expect(stderr.mock.calls).toEqual([["[yellow]careful[/yellow]"], ["[red]broken[/red]"]]);
  });

  it("prints nothing when silent", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const log = new Logger();
    log.configure({ level: "silent" });

    log.error("broken");

    expect(stderr).not.toHaveBeenCalled();
  });

  it("labels child output and follows the parent's level", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const parent = new Logger();
    const child = parent.child("Scanner");

    child.debug("hidden");
    parent.configure({ level: "debug" });
    child.debug("walking");

    expect(stderr.mock.calls).toEqual([["[gray][dim][Scanner][/dim] walking[/gray]"]]);
    expect(child.isLevelEnabled("debug")).toBe(true);
  });
});
