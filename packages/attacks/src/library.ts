import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import {
  ConfigurationError,
  SEVERITIES,
  isPlainRecord,
  type AttackChain,
  type PayloadAttackSet,
  type Severity
} from "@guardrail/core";

export type AttackLibrary = {
  payloadSets: readonly PayloadAttackSet[];
  chains: readonly AttackChain[];
};

const DEFAULT_LIBRARY_URL = new URL("../data/attacks.yaml", import.meta.url);

let defaultLibrary: AttackLibrary | undefined;

// Load the attack library from YAML, failing on the first malformed entry.
export function loadAttackLibrary(source: string | URL = DEFAULT_LIBRARY_URL): AttackLibrary {
  const label = typeof source === "string" ? source : fileURLToPath(source);
  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(source, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Unable to load attack library at ${label}.`, { source: label, cause: err });
  }
  if (!isPlainRecord(parsed)) {
    throw new ConfigurationError(`Attack library at ${label} must be a mapping.`, { source: label });
  }
  const payloadSets = readList(parsed.payloadSets, "payloadSets", label).map((entry, index) =>
    readPayloadSet(entry, index, label)
  );
  const chains = readList(parsed.chains, "chains", label).map((entry, index) => readChain(entry, index, label));
  assertUniqueNames(chains.map((chain) => chain.name), label);
  assertUniqueNames(payloadSets.map((set) => set.name), label);
  return Object.freeze({ payloadSets: Object.freeze(payloadSets), chains: Object.freeze(chains) });
}

export function getDefaultAttackLibrary(): AttackLibrary {
  if (!defaultLibrary) {
    defaultLibrary = loadAttackLibrary();
  }
  return defaultLibrary;
}

export function defineChain(chain: AttackChain, source = "inline"): AttackChain {
  if (chain.steps.length < 2) {
    throw new ConfigurationError(`Attack chain "${chain.name}" needs at least two steps.`, {
      source,
      entry: chain.name
    });
  }
  return Object.freeze({ ...chain, steps: Object.freeze([...chain.steps]) });
}

function readPayloadSet(entry: unknown, index: number, source: string): PayloadAttackSet {
  if (!isPlainRecord(entry)) {
    throw new ConfigurationError(`Payload set #${index + 1} must be a mapping.`, { source });
  }
  const name = readString(entry, "name", `payload set #${index + 1}`, source);
  const severity = readSeverity(entry.severity, name, source);
  const payloads = readStrings(entry.payloads, name, source);
  if (payloads.length === 0) {
    throw new ConfigurationError(`Payload set "${name}" has no payloads.`, { source, entry: name });
  }
  return Object.freeze({
    name,
    category: readString(entry, "category", name, source),
    severity,
    payloads: Object.freeze(payloads)
  });
}

function readChain(entry: unknown, index: number, source: string): AttackChain {
  if (!isPlainRecord(entry)) {
    throw new ConfigurationError(`Attack chain #${index + 1} must be a mapping.`, { source });
  }
  const name = readString(entry, "name", `chain #${index + 1}`, source);
  return defineChain(
    {
      name,
      description: readString(entry, "description", name, source),
      attackType: readString(entry, "attackType", name, source),
      steps: readStrings(entry.steps, name, source)
    },
    source
  );
}

function readList(value: unknown, key: string, source: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`Attack library must contain a "${key}" list.`, { source });
  }
  return value;
}

function readString(record: Record<string, unknown>, key: string, label: string, source: string): string {
  const value = record[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ConfigurationError(`${label} is missing "${key}".`, { source, entry: label });
  }
  return value.trim();
}

function readStrings(value: unknown, label: string, source: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigurationError(`${label} must list its entries as strings.`, { source, entry: label });
  }
  return value.map((item) => item.trim()).filter((item) => item.length > 0);
}

function readSeverity(value: unknown, label: string, source: string): Severity {
  const normalized = typeof value === "string" ? value.trim().toUpperCase() : "";
  const severity = SEVERITIES.find((entry) => entry === normalized);
  if (!severity) {
    throw new ConfigurationError(`${label} has unknown severity "${String(value)}".`, { source, entry: label });
  }
  return severity;
}

function assertUniqueNames(names: string[], source: string): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new ConfigurationError(`Duplicate attack entry "${name}".`, { source, entry: name });
    }
    seen.add(name);
  }
}
