import { afterEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import {
  compileRules,
  getDefaultRules,
  groupRulesByCategory,
  loadRules,
  rulesByCategory
} from "../../packages/scanner/src/index.js";
import { ConfigurationError, THREAT_CATEGORIES } from "../../packages/core/src/index.js";

const tempDirs: string[] = [];

function writeCatalog(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "guardrail-test-"));
  tempDirs.push(dir);
  const file = path.join(dir, "rules.yaml");
  fs.writeFileSync(file, contents, "utf8");
  return file;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("pattern registry", () => {
  it("ships a catalog that covers every category with unique ids", () => {
    const rules = getDefaultRules();
    expect(rules).toHaveLength(54);
    expect(new Set(rules.map((rule) => rule.id)).size).toBe(rules.length);
    for (const [category, group] of groupRulesByCategory(rules)) {
      expect(THREAT_CATEGORIES).toContain(category);
      expect(group.length).toBeGreaterThan(0);
    }
  });

  it("compiles the catalog once and freezes it", () => {
    const rules = getDefaultRules();
    expect(getDefaultRules()).toBe(rules);
    expect(Object.isFrozen(rules)).toBe(true);
    expect(Object.isFrozen(rules[0])).toBe(true);
    expect(rules[0]?.pattern.flags).toContain("i");
  });

  it("partitions rules by category in catalog order", () => {
    const ids = rulesByCategory(getDefaultRules(), "sql_injection").map((rule) => rule.id);
    expect(ids).toEqual(["SQ-001", "SQ-002", "SQ-003", "SQ-004", "SQ-005", "SQ-006"]);
  });

  it("keeps framework references", () => {
    const rule = getDefaultRules().find((entry) => entry.id === "SQ-001");
    expect(rule?.references).toBe("OWASP-LLM02, OWASP-A03, CWE-89");
  });

  it("rejects a pattern that does not compile", () => {
    const err = captureError(() =>
      compileRules([{ id: "BAD-1", category: "jailbreak", pattern: "(unclosed", severity: "HIGH", description: "x" }])
    );
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toMatchObject({ entry: "BAD-1", source: "inline" });
  });

  it("rejects duplicate ids, unknown categories and unknown severities", () => {
    const base = { pattern: "x", description: "x" };
    expect(() =>
      compileRules([
        { ...base, id: "D-1", category: "jailbreak", severity: "LOW" },
        { ...base, id: "D-1", category: "jailbreak", severity: "LOW" }
      ])
    ).toThrow('Duplicate rule id "D-1".');
    expect(() => compileRules([{ ...base, id: "C-1", category: "phishing", severity: "LOW" }])).toThrow(
      'Rule "C-1" has unknown category "phishing".'
    );
    expect(() => compileRules([{ ...base, id: "S-1", category: "jailbreak", severity: "SEVERE" }])).toThrow(
      'Rule "S-1" has unknown severity "SEVERE".'
    );
  });

  it("loads a catalog from disk", () => {
    const file = writeCatalog(
      [
        "rules:",
        "  - id: X-1",
        "    category: data_exfiltration",
        "    severity: medium",
        "    pattern: 'leak\\s+it'",
        "    description: Leak request"
      ].join("\n")
    );
    const rules = loadRules(file);
    expect(rules.map((rule) => [rule.id, rule.severity, rule.pattern.source])).toEqual([["X-1", "MEDIUM", "leak\\s+it"]]);
  });

  it("fails the whole load on a malformed entry", () => {
    const missingField = writeCatalog(["rules:", "  - id: X-1", "    category: jailbreak", "    severity: LOW"].join("\n"));
    expect(() => loadRules(missingField)).toThrow('Rule X-1 is missing "pattern".');

    const noList = writeCatalog("patterns: []\n");
    expect(() => loadRules(noList)).toThrow(ConfigurationError);

    expect(() => loadRules(path.join(os.tmpdir(), "guardrail-missing", "rules.yaml"))).toThrow(ConfigurationError);
  });
});
