import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { configureLogger, createScopedLogger, getLogFile } from "../../src/lib/debug-logger";

describe("debug logger", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "screenflow-log-"));
  });

  afterEach(async () => {
    configureLogger({ logLevel: "off" });
    await rm(dir, { recursive: true, force: true });
  });

  test("appends JSON lines at or above the configured level", async () => {
    configureLogger({ logDir: dir, logLevel: "info" });
    const log = createScopedLogger("flow");

    log.debug("Skipped");
    log.info("Flow started", { steps: 2 });

    expect(getLogFile()).toBe(join(dir, "screenflow.log"));
    await vi.waitFor(async () => {
      const lines = (await readFile(getLogFile(), "utf8")).trim().split("\n");
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? "")).toMatchObject({
        level: "info",
        scope: "flow",
        message: "Flow started",
        data: { steps: 2 },
      });
    });
  });
});
