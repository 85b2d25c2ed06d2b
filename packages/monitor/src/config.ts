import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { parse as parseYaml } from "yaml";
import { SEVERITIES, isPlainRecord, type LogLevel, type ScoringWeights, type Severity } from "@guardrail/core";
import { DEFAULT_SCORING_WEIGHTS, mergeWeights } from "@guardrail/scanner";

export type PresetName = "strict" | "standard" | "dev";

export const PRESET_NAMES: readonly PresetName[] = ["strict", "standard", "dev"];

export type MonitorThresholds = {
  /** Scores at or above this are recorded as events. */
  logThreshold: number;
  /** Scores at or above this are queued for human review. */
  reviewThreshold: number;
  /** Scores at or above this are blocked when `autoBlock` is on. */
  blockThreshold: number;
  autoBlock: boolean;
};

export type MonitorConfig = {
  mode: string;
  log: LogLevel;
  thresholds: MonitorThresholds;
  scoring: ScoringWeights;
};

export type LoadedMonitorConfig = {
  config: MonitorConfig;
  warnings: string[];
  source: string;
};

const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".guardrail", "guardrail.yaml");

const DEFAULT_MONITOR_CONFIG: MonitorConfig = {
  mode: "standard",
  log: "safe",
  thresholds: {
    logThreshold: 1,
    reviewThreshold: 31,
    blockThreshold: 61,
    autoBlock: true
  },
  scoring: mergeWeights(DEFAULT_SCORING_WEIGHTS)
};

// Resolve the default override path on the local machine.
export function getDefaultConfigPath(): string {
  return DEFAULT_CONFIG_PATH;
}

export function isPresetName(value: unknown): value is PresetName {
  return typeof value === "string" && PRESET_NAMES.some((name) => name === value);
}

// Load monitor config from preset + optional override path.
export function loadMonitorConfig(params: { preset?: PresetName; configPath?: string } = {}): LoadedMonitorConfig {
  const warnings: string[] = [];
  const presetName = params.preset ?? "standard";
  const presetConfig = loadPresetConfig(presetName, warnings);

  const configPath = params.configPath ?? DEFAULT_CONFIG_PATH;
  const override = loadConfigFile(configPath, warnings);

  const config = override === null ? presetConfig : mergeConfig(presetConfig, override, configPath, warnings);
  checkThresholdOrder(config.thresholds, warnings);

  return {
    config,
    warnings,
    source: override === null ? `preset:${presetName}` : configPath
  };
}

// Load a preset without merging any on-disk override.
export function loadPresetConfigOnly(name: PresetName): MonitorConfig {
  return loadPresetConfig(name, []);
}

function loadPresetConfig(name: PresetName, warnings: string[]): MonitorConfig {
  const presetPath = new URL(`../presets/${name}.yaml`, import.meta.url);
  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(presetPath, "utf8"));
  } catch {
    warnings.push(`Failed to load preset ${name}; falling back to default config.`);
    return cloneConfig(DEFAULT_MONITOR_CONFIG);
  }
  return mergeConfig(DEFAULT_MONITOR_CONFIG, parsed, `preset ${name}`, warnings);
}

function loadConfigFile(configPath: string, warnings: string[]): unknown {
  if (!fs.existsSync(configPath)) {
    warnings.push(`Config file not found at ${configPath}; using preset defaults.`);
    return null;
  }
  try {
    const parsed: unknown = parseYaml(fs.readFileSync(configPath, "utf8"));
    // An empty file parses to null and leaves the preset untouched.
    return parsed ?? {};
  } catch {
    warnings.push(`Failed to parse config file at ${configPath}; using preset defaults.`);
    return null;
  }
}

function mergeConfig(base: MonitorConfig, override: unknown, label: string, warnings: string[]): MonitorConfig {
  if (!isPlainRecord(override)) {
    warnings.push(`Config in ${label} must be a mapping; ignoring it.`);
    return cloneConfig(base);
  }
  const thresholds = isPlainRecord(override.thresholds) ? override.thresholds : {};
  const scoring = isPlainRecord(override.scoring) ? override.scoring : {};
  const severityPoints = isPlainRecord(scoring.severityPoints) ? scoring.severityPoints : {};

  return {
    mode: typeof override.mode === "string" && override.mode.trim() ? override.mode.trim() : base.mode,
    log: normalizeLogLevel(override.log, base.log, label, warnings),
    thresholds: {
      logThreshold: normalizeScore(thresholds.logThreshold, base.thresholds.logThreshold, `${label} thresholds.logThreshold`, warnings),
      reviewThreshold: normalizeScore(
        thresholds.reviewThreshold,
        base.thresholds.reviewThreshold,
        `${label} thresholds.reviewThreshold`,
        warnings
      ),
      blockThreshold: normalizeScore(
        thresholds.blockThreshold,
        base.thresholds.blockThreshold,
        `${label} thresholds.blockThreshold`,
        warnings
      ),
      autoBlock: normalizeBoolean(thresholds.autoBlock, base.thresholds.autoBlock, `${label} thresholds.autoBlock`, warnings)
    },
    scoring: {
      severityPoints: normalizeSeverityPoints(severityPoints, base.scoring.severityPoints, label, warnings),
      keywordWeight: normalizeWeight(scoring.keywordWeight, base.scoring.keywordWeight, `${label} scoring.keywordWeight`, warnings),
      mitigationWeight: normalizeWeight(
        scoring.mitigationWeight,
        base.scoring.mitigationWeight,
        `${label} scoring.mitigationWeight`,
        warnings
      )
    }
  };
}

function normalizeLogLevel(value: unknown, fallback: LogLevel, label: string, warnings: string[]): LogLevel {
  if (value === undefined) {
    return fallback;
  }
  if (value === "safe" || value === "debug") {
    return value;
  }
  warnings.push(`Invalid log level in ${label}; using "${fallback}".`);
  return fallback;
}

function normalizeScore(value: unknown, fallback: number, label: string, warnings: string[]): number {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 100) {
    return value;
  }
  warnings.push(`Invalid ${label}; expected an integer between 0 and 100, using ${fallback}.`);
  return fallback;
}

function normalizeWeight(value: unknown, fallback: number, label: string, warnings: string[]): number {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value === "number" && Number.isFinite(value) && value >= 0) {
    return value;
  }
  warnings.push(`Invalid ${label}; expected a non-negative number, using ${fallback}.`);
  return fallback;
}

function normalizeBoolean(value: unknown, fallback: boolean, label: string, warnings: string[]): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value === "boolean") {
    return value;
  }
  warnings.push(`Invalid ${label}; expected true or false, using ${String(fallback)}.`);
  return fallback;
}

function normalizeSeverityPoints(
  value: Record<string, unknown>,
  fallback: Record<Severity, number>,
  label: string,
  warnings: string[]
): Record<Severity, number> {
  const points = { ...fallback };
  for (const severity of SEVERITIES) {
    points[severity] = normalizeWeight(
      value[severity],
      fallback[severity],
      `${label} scoring.severityPoints.${severity}`,
      warnings
    );
  }
  return points;
}

function checkThresholdOrder(thresholds: MonitorThresholds, warnings: string[]): void {
  if (thresholds.reviewThreshold > thresholds.blockThreshold) {
    warnings.push(
      `reviewThreshold (${thresholds.reviewThreshold}) is above blockThreshold (${thresholds.blockThreshold}); blocked inputs skip review.`
    );
  }
}

function cloneConfig(config: MonitorConfig): MonitorConfig {
  return {
    ...config,
    thresholds: { ...config.thresholds },
    scoring: mergeWeights(config.scoring)
  };
}
