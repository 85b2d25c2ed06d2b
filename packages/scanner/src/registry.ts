import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import {
  ConfigurationError,
  SEVERITIES,
  THREAT_CATEGORIES,
  isPlainRecord,
  type Rule,
  type RuleDefinition,
  type Severity,
  type ThreatCategory
} from "@guardrail/core";

const DEFAULT_RULES_URL = new URL("../rules/default.yaml", import.meta.url);

let defaultRules: readonly Rule[] | undefined;

// Resolve the bundled rule catalog path.
export function getDefaultRulesPath(): string {
  return fileURLToPath(DEFAULT_RULES_URL);
}

/**
 * Load and compile a YAML rule catalog. Any malformed entry aborts the load
 * with a ConfigurationError; nothing is skipped.
 */
export function loadRules(source: string | URL = DEFAULT_RULES_URL): readonly Rule[] {
  const label = typeof source === "string" ? source : fileURLToPath(source);
  let raw: string;
  try {
    raw = fs.readFileSync(source, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Unable to read rule catalog at ${label}.`, { source: label, cause: err });
  }
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigurationError(`Rule catalog at ${label} is not valid YAML.`, { source: label, cause: err });
  }
  const entries = isPlainRecord(parsed) ? parsed.rules : undefined;
  if (!Array.isArray(entries)) {
    throw new ConfigurationError(`Rule catalog at ${label} must contain a "rules" list.`, { source: label });
  }
  return compileRules(entries.map((entry, index) => readDefinition(entry, index, label)), label);
}

// Default catalog, compiled once per process.
export function getDefaultRules(): readonly Rule[] {
  if (!defaultRules) {
    defaultRules = loadRules();
  }
  return defaultRules;
}

export function compileRules(definitions: RuleDefinition[], source = "inline"): readonly Rule[] {
  const seen = new Set<string>();
  const rules: Rule[] = [];
  for (const definition of definitions) {
    const id = definition.id.trim();
    if (!id) {
      throw new ConfigurationError("Rule id must not be empty.", { source });
    }
    if (seen.has(id)) {
      throw new ConfigurationError(`Duplicate rule id "${id}".`, { source, entry: id });
    }
    seen.add(id);
    rules.push(compileRule({ ...definition, id }, source));
  }
  return Object.freeze(rules);
}

function compileRule(definition: RuleDefinition, source: string): Rule {
  const category = normalizeCategory(definition.category);
  if (!category) {
    throw new ConfigurationError(`Rule "${definition.id}" has unknown category "${definition.category}".`, {
      source,
      entry: definition.id
    });
  }
  const severity = normalizeSeverity(definition.severity);
  if (!severity) {
    throw new ConfigurationError(`Rule "${definition.id}" has unknown severity "${definition.severity}".`, {
      source,
      entry: definition.id
    });
  }
  let pattern: RegExp;
  try {
    pattern = new RegExp(definition.pattern, "i");
  } catch (err) {
    throw new ConfigurationError(`Rule "${definition.id}" has an invalid pattern: ${String(err)}`, {
      source,
      entry: definition.id,
      cause: err
    });
  }
  const rule: Rule = {
    id: definition.id,
    category,
    pattern,
    severity,
    description: definition.description,
    ...(definition.references ? { references: definition.references } : {})
  };
  return Object.freeze(rule);
}

export function rulesByCategory(rules: readonly Rule[], category: ThreatCategory): Rule[] {
  return rules.filter((rule) => rule.category === category);
}

// Partition rules by category, keeping catalog order inside each group.
export function groupRulesByCategory(rules: readonly Rule[]): Map<ThreatCategory, Rule[]> {
  const groups = new Map<ThreatCategory, Rule[]>();
  for (const category of THREAT_CATEGORIES) {
    groups.set(category, []);
  }
  for (const rule of rules) {
    groups.get(rule.category)?.push(rule);
  }
  return groups;
}

export function normalizeCategory(value: string): ThreatCategory | undefined {
  const normalized = value.trim().toLowerCase();
  return THREAT_CATEGORIES.find((category) => category === normalized);
}

export function normalizeSeverity(value: string): Severity | undefined {
  const normalized = value.trim().toUpperCase();
  return SEVERITIES.find((severity) => severity === normalized);
}

function readDefinition(entry: unknown, index: number, source: string): RuleDefinition {
  if (!isPlainRecord(entry)) {
    throw new ConfigurationError(`Rule #${index + 1} must be a mapping.`, { source });
  }
  const field = (name: string): string => {
    const value = entry[name];
    if (typeof value !== "string" || value.trim().length === 0) {
      const label = typeof entry.id === "string" ? entry.id : `#${index + 1}`;
      throw new ConfigurationError(`Rule ${label} is missing "${name}".`, { source, entry: label });
    }
    return value;
  };
  const definition: RuleDefinition = {
    id: field("id"),
    category: field("category"),
    pattern: field("pattern"),
    severity: field("severity"),
    description: field("description")
  };
  if (typeof entry.references === "string") {
    definition.references = entry.references;
  }
  return definition;
}
