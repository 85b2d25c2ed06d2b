import { afterEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { loadMonitorConfig, loadPresetConfigOnly } from "../../packages/monitor/src/index.js";

const tempDirs: string[] = [];

function writeConfig(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "guardrail-test-"));
  tempDirs.push(dir);
  const file = path.join(dir, "guardrail.yaml");
  fs.writeFileSync(file, contents, "utf8");
  return file;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("monitor config", () => {
  it("ships three presets", () => {
    expect(loadPresetConfigOnly("strict").thresholds).toEqual({
      logThreshold: 1,
      reviewThreshold: 21,
      blockThreshold: 41,
      autoBlock: true
    });
    expect(loadPresetConfigOnly("standard").thresholds).toEqual({
      logThreshold: 1,
      reviewThreshold: 31,
      blockThreshold: 61,
      autoBlock: true
    });
    const dev = loadPresetConfigOnly("dev");
    expect(dev.log).toBe("debug");
    expect(dev.thresholds.autoBlock).toBe(false);
    expect(dev.scoring.keywordWeight).toBe(11);
  });

  it("warns and falls back to the preset when the file is missing", () => {
    const configPath = path.join(os.tmpdir(), "guardrail-missing", "guardrail.yaml");
    const loaded = loadMonitorConfig({ preset: "strict", configPath });
    expect(loaded.source).toBe("preset:strict");
    expect(loaded.warnings).toEqual([`Config file not found at ${configPath}; using preset defaults.`]);
    expect(loaded.config.mode).toBe("strict");
  });

  it("merges an override file over the preset", () => {
    const configPath = writeConfig(
      [
        "log: debug",
        "thresholds:",
        "  reviewThreshold: 25",
        "  blockThreshold: high",
        "scoring:",
        "  keywordWeight: 5",
        "  severityPoints:",
        "    LOW: 15"
      ].join("\n")
    );
    const loaded = loadMonitorConfig({ configPath });
    expect(loaded.source).toBe(configPath);
    expect(loaded.config.log).toBe("debug");
    expect(loaded.config.thresholds).toEqual({
      logThreshold: 1,
      reviewThreshold: 25,
      blockThreshold: 61,
      autoBlock: true
    });
    expect(loaded.config.scoring).toEqual({
      severityPoints: { CRITICAL: 60, HIGH: 40, MEDIUM: 20, LOW: 15 },
      keywordWeight: 5,
      mitigationWeight: 15
    });
    expect(loaded.warnings).toEqual([
      `Invalid ${configPath} thresholds.blockThreshold; expected an integer between 0 and 100, using 61.`
    ]);
  });

  it("warns on unparsable YAML", () => {
    const configPath = writeConfig("thresholds: [unterminated\n");
    const loaded = loadMonitorConfig({ preset: "dev", configPath });
    expect(loaded.source).toBe("preset:dev");
    expect(loaded.warnings).toEqual([`Failed to parse config file at ${configPath}; using preset defaults.`]);
  });

  it("warns when review sits above block", () => {
    const configPath = writeConfig(["thresholds:", "  reviewThreshold: 70", "  blockThreshold: 50"].join("\n"));
    const loaded = loadMonitorConfig({ configPath });
    expect(loaded.warnings).toEqual([
      "reviewThreshold (70) is above blockThreshold (50); blocked inputs skip review."
    ]);
  });
});
