import type { GuardrailLogger, Rule, Threat } from "@guardrail/core";
import { getDefaultRules } from "./registry.js";

export type Detector = {
  rules: readonly Rule[];
  scan: (text: string | null | undefined) => Threat[];
};

export type DetectorOptions = {
  rules?: readonly Rule[];
  logger?: GuardrailLogger;
};

let defaultDetector: Detector | undefined;

// Build a detector over a fixed rule set.
export function createDetector(options: DetectorOptions = {}): Detector {
  const rules = options.rules ?? getDefaultRules();
  const logger = options.logger;
  const compiled = rules.map((rule) => ({ rule, pattern: toStatelessPattern(rule.pattern) }));

  const scan = (text: string | null | undefined): Threat[] => {
    if (!text) {
      return [];
    }
    const threats: Threat[] = [];
    for (const { rule, pattern } of compiled) {
      if (matchesRule(rule, pattern, text, logger)) {
        threats.push(toThreat(rule));
      }
    }
    return threats;
  };

  return { rules, scan };
}

// Scan text against the default rule catalog.
export function scanText(text: string | null | undefined): Threat[] {
  if (!defaultDetector) {
    defaultDetector = createDetector();
  }
  return defaultDetector.scan(text);
}

// Global and sticky patterns keep lastIndex between calls; matching is always case-insensitive.
function toStatelessPattern(pattern: RegExp): RegExp {
  const stripped = pattern.flags.replace(/[gy]/g, "");
  const flags = stripped.includes("i") ? stripped : `${stripped}i`;
  return flags === pattern.flags ? pattern : new RegExp(pattern.source, flags);
}

function matchesRule(rule: Rule, pattern: RegExp, text: string, logger: GuardrailLogger | undefined): boolean {
  try {
    return pattern.test(text);
  } catch (err) {
    // A failing rule counts as a non-match; the rest of the scan continues.
    logger?.warn?.(`[guardrail] Rule ${rule.id} failed to evaluate: ${String(err)}`);
    return false;
  }
}

function toThreat(rule: Rule): Threat {
  return {
    id: rule.id,
    category: rule.category,
    severity: rule.severity,
    description: rule.description,
    pattern: rule.pattern.source
  };
}
