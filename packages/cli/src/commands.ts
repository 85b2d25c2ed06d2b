import { Command } from "commander";
import { ConfigurationError, THREAT_CATEGORIES, isPlainRecord, type GuardrailLogger } from "@guardrail/core";
import {
  getDefaultRules,
  getDefaultRulesPath,
  groupRulesByCategory,
  loadRules,
  normalizeCategory,
  rulesByCategory,
  scanText,
  scoreText
} from "@guardrail/scanner";
import { getDefaultAttackLibrary, loadAttackLibrary, runChainScan, runScan } from "@guardrail/attacks";
import { getDefaultConfigPath, isPresetName, loadMonitorConfig, type PresetName } from "@guardrail/monitor";
import {
  formatChainSummary,
  formatRuleGroups,
  formatScanReport,
  formatScore,
  formatThreats
} from "./format.js";

export type GuardrailCliOptions = {
  logger?: GuardrailLogger;
};

export const DEFAULT_AGENT_PROMPT = "You are a helpful assistant.";

// Register guardrail commands on a commander program.
export function registerGuardrailCli(program: Command, options: GuardrailCliOptions = {}): void {
  const logger = options.logger;

  program
    .command("detect")
    .description("List the rules an input trips")
    .argument("<text>", "Text to scan")
    .option("--json", "Print threats as JSON")
    .action((...args: unknown[]) => {
      const opts = getOptions(args);
      const threats = scanText(getText(args));
      logger?.info?.(opts.json === true ? JSON.stringify(threats, null, 2) : formatThreats(threats));
    });

  program
    .command("score")
    .description("Score an input and show the recommendation")
    .argument("<text>", "Text to score")
    .option("--json", "Print the score result as JSON")
    .action((...args: unknown[]) => {
      const opts = getOptions(args);
      const result = scoreText(getText(args));
      logger?.info?.(opts.json === true ? JSON.stringify(result, null, 2) : formatScore(result));
    });

  program
    .command("scan")
    .description("Run every attack set and chain against an agent prompt")
    .argument("[prompt]", "Agent system prompt", DEFAULT_AGENT_PROMPT)
    .option("--quiet", "Only print the summary")
    .option("--json", "Print the full report as JSON")
    .action((...args: unknown[]) => {
      const opts = getOptions(args);
      const report = runScan(getText(args, DEFAULT_AGENT_PROMPT));
      logger?.info?.(opts.json === true ? JSON.stringify(report, null, 2) : formatScanReport(report, opts.quiet === true));
    });

  program
    .command("chains")
    .description("Run the multi-step attack chains against an agent prompt")
    .argument("[prompt]", "Agent system prompt", DEFAULT_AGENT_PROMPT)
    .option("--json", "Print the chain summary as JSON")
    .action((...args: unknown[]) => {
      const opts = getOptions(args);
      const summary = runChainScan(getText(args, DEFAULT_AGENT_PROMPT));
      logger?.info?.(opts.json === true ? JSON.stringify(summary, null, 2) : formatChainSummary(summary));
    });

  program
    .command("rules")
    .description("List detection rules grouped by category")
    .option("--category <name>", `One of: ${THREAT_CATEGORIES.join(", ")}`)
    .action((...args: unknown[]) => {
      const opts = getOptions(args);
      const rules = getDefaultRules();
      if (typeof opts.category !== "string") {
        logger?.info?.(formatRuleGroups(groupRulesByCategory(rules)));
        return;
      }
      const category = normalizeCategory(opts.category);
      if (!category) {
        logger?.error?.(`Unknown category "${opts.category}". Expected one of: ${THREAT_CATEGORIES.join(", ")}.`);
        return;
      }
      logger?.info?.(formatRuleGroups(new Map([[category, rulesByCategory(rules, category)]])));
    });

  program
    .command("validate")
    .description("Check the rule catalog, attack library and monitor config")
    .option("--rules <path>", "Rule catalog YAML")
    .option("--attacks <path>", "Attack library YAML")
    .option("--config <path>", "Monitor config override file")
    .option("--preset <preset>", "Preset: strict|standard|dev")
    .action((...args: unknown[]) => {
      const opts = getOptions(args);
      try {
        const rulesPath = typeof opts.rules === "string" ? opts.rules : getDefaultRulesPath();
        const rules = loadRules(rulesPath);
        const library =
          typeof opts.attacks === "string" ? loadAttackLibrary(opts.attacks) : getDefaultAttackLibrary();
        logger?.info?.(`Rule catalog: ${rulesPath}`);
        logger?.info?.(
          `Rules: ${rules.length}. Payload sets: ${library.payloadSets.length}. Chains: ${library.chains.length}.`
        );
      } catch (err) {
        if (err instanceof ConfigurationError) {
          logger?.error?.(`${err.message}${err.entry ? ` (entry: ${err.entry})` : ""}`);
          return;
        }
        throw err;
      }

      const loaded = loadMonitorConfig({
        preset: normalizePreset(opts.preset),
        configPath: typeof opts.config === "string" ? opts.config : getDefaultConfigPath()
      });
      const { thresholds } = loaded.config;
      logger?.info?.(`Config source: ${loaded.source}`);
      logger?.info?.(
        `Thresholds: log ${thresholds.logThreshold}, review ${thresholds.reviewThreshold}, block ${thresholds.blockThreshold} (auto-block ${thresholds.autoBlock ? "on" : "off"})`
      );
      loaded.warnings.forEach((warning) => logger?.warn?.(`Warning: ${warning}`));
    });
}

function normalizePreset(value: unknown): PresetName {
  return isPresetName(value) ? value : "standard";
}

// Commander passes positional arguments first, then options, then the command.
function getOptions(args: unknown[]): Record<string, unknown> {
  const last = args[args.length - 1];
  if (last instanceof Command) {
    return last.opts();
  }
  return isPlainRecord(last) ? last : {};
}

function getText(args: unknown[], fallback = ""): string {
  const first = args[0];
  return typeof first === "string" ? first : fallback;
}
