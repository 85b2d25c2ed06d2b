import {
  BlockedInputError,
  shortHash,
  type GuardrailLogger,
  type ScoreResult,
  type Severity,
  type Threat,
  type ThreatCategory
} from "@guardrail/core";
import { ReviewQueue, createDetector, createRiskScorer, type RiskScorer } from "@guardrail/scanner";
import { loadMonitorConfig, type MonitorConfig, type MonitorThresholds, type PresetName } from "./config.js";

export type MonitorAction = "allow" | "log" | "review" | "block";

export type MonitorStage = "prompt" | "tool_input" | "chain_input";

export type MonitorEvaluation = {
  action: MonitorAction;
  result: ScoreResult;
  reviewItemId?: string;
};

export type MonitorEvent = {
  id: string;
  timestamp: string;
  stage: MonitorStage;
  action: Exclude<MonitorAction, "allow">;
  score: number;
  level: ScoreResult["level"];
  threats: Threat[];
  preview: string;
  metadata: Record<string, unknown>;
  reviewItemId?: string;
};

export type ThreatSummary = {
  totalEvents: number;
  logged: number;
  reviewed: number;
  blocked: number;
  byCategory: Partial<Record<ThreatCategory, number>>;
  bySeverity: Record<Severity, number>;
};

export type MonitorState = {
  config: MonitorConfig;
  configSource: string;
  warnings: string[];
  scorer: Pick<RiskScorer, "score">;
  queue: ReviewQueue;
  events: MonitorEvent[];
  logger?: GuardrailLogger;
};

export type MonitorOptions = {
  config?: MonitorConfig;
  preset?: PresetName;
  configPath?: string;
  scorer?: Pick<RiskScorer, "score">;
  queue?: ReviewQueue;
  logger?: GuardrailLogger;
};

export type ToolInputEvent = {
  toolName: string;
  input: string;
};

const PREVIEW_LIMIT = 100;

// Initialize monitor state from an explicit config or from presets on disk.
export function createMonitorState(options: MonitorOptions = {}): MonitorState {
  const logger = options.logger;
  let config: MonitorConfig;
  let configSource = "inline";
  let warnings: string[] = [];
  if (options.config) {
    config = options.config;
  } else {
    const loadParams: { preset?: PresetName; configPath?: string } = {};
    if (options.preset) {
      loadParams.preset = options.preset;
    }
    if (options.configPath) {
      loadParams.configPath = options.configPath;
    }
    const loaded = loadMonitorConfig(loadParams);
    config = loaded.config;
    configSource = loaded.source;
    warnings = loaded.warnings;
    warnings.forEach((warning) => logger?.warn?.(`[guardrail] ${warning}`));
  }

  const scorer =
    options.scorer ??
    createRiskScorer({
      detector: logger ? createDetector({ logger }) : createDetector(),
      weights: config.scoring
    });

  const state: MonitorState = {
    config,
    configSource,
    warnings,
    scorer,
    queue: options.queue ?? new ReviewQueue(),
    events: []
  };
  if (logger) {
    state.logger = logger;
  }
  return state;
}

// Map a score onto the action the configured thresholds call for.
export function decideAction(thresholds: MonitorThresholds, result: ScoreResult): MonitorAction {
  if (thresholds.autoBlock && result.score >= thresholds.blockThreshold) {
    return "block";
  }
  if (result.score >= thresholds.reviewThreshold) {
    return "review";
  }
  if (!thresholds.autoBlock && result.score >= thresholds.blockThreshold) {
    return "review";
  }
  if (result.score >= thresholds.logThreshold || result.threats.length > 0) {
    return "log";
  }
  return "allow";
}

// Score text without recording anything.
export function evaluateText(state: MonitorState, text: string | null | undefined): MonitorEvaluation {
  const result = state.scorer.score(text);
  return { action: decideAction(state.config.thresholds, result), result };
}

// Handle prompts about to reach the model. Throws BlockedInputError on the first blocked prompt.
export function handleBeforePrompt(state: MonitorState, prompts: string | readonly string[]): MonitorEvaluation[] {
  const list = typeof prompts === "string" ? [prompts] : prompts;
  return list.map((prompt, index) => inspect(state, "prompt", prompt, { promptIndex: index }));
}

// Handle a tool invocation before its input is executed.
export function handleBeforeToolInput(state: MonitorState, event: ToolInputEvent): MonitorEvaluation {
  return inspect(state, "tool_input", event.input, { toolName: event.toolName });
}

// Handle chain inputs; only string values are inspected.
export function handleBeforeChainInput(
  state: MonitorState,
  inputs: Record<string, unknown>
): Record<string, MonitorEvaluation> {
  // Keys such as "__proto__" must land as own entries.
  const evaluations: [string, MonitorEvaluation][] = [];
  for (const [key, value] of Object.entries(inputs)) {
    if (typeof value !== "string") {
      continue;
    }
    evaluations.push([key, inspect(state, "chain_input", value, { inputKey: key })]);
  }
  return Object.fromEntries(evaluations);
}

export function getEvents(state: MonitorState): MonitorEvent[] {
  return state.events.map((event) => ({ ...event }));
}

export function clearEvents(state: MonitorState): void {
  state.events.length = 0;
}

export function getThreatSummary(state: MonitorState): ThreatSummary {
  const summary: ThreatSummary = {
    totalEvents: state.events.length,
    logged: 0,
    reviewed: 0,
    blocked: 0,
    byCategory: {},
    bySeverity: { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0 }
  };
  for (const event of state.events) {
    if (event.action === "log") {
      summary.logged += 1;
    } else if (event.action === "review") {
      summary.reviewed += 1;
    } else {
      summary.blocked += 1;
    }
    for (const threat of event.threats) {
      summary.byCategory[threat.category] = (summary.byCategory[threat.category] ?? 0) + 1;
      summary.bySeverity[threat.severity] += 1;
    }
  }
  return summary;
}

function inspect(
  state: MonitorState,
  stage: MonitorStage,
  text: string,
  metadata: Record<string, unknown>
): MonitorEvaluation {
  const evaluation = evaluateText(state, text);
  const { action, result } = evaluation;
  if (action === "allow") {
    return evaluation;
  }

  for (const threat of result.threats) {
    state.logger?.warn?.(
      `[guardrail] ${stage}: ${threat.severity} ${threat.category} [${threat.id}] ${threat.description}`
    );
  }

  // HIGH results stay reviewable after a block so an operator can override.
  let reviewItemId: string | undefined;
  if (action === "review" || (action === "block" && result.requiresReview)) {
    reviewItemId = state.queue.add(text, result, { stage, ...metadata }).id;
  }

  recordEvent(state, stage, action, result, text, metadata, reviewItemId);

  if (action === "block") {
    state.logger?.error?.(`[guardrail] Blocked ${stage} with score ${result.score} (${result.level}).`);
    const details = {
      stage,
      score: result.score,
      level: result.level,
      recommendation: result.recommendation
    };
    throw new BlockedInputError(reviewItemId ? { ...details, reviewItemId } : details);
  }

  if (action === "review") {
    state.logger?.info?.(`[guardrail] Queued ${stage} for review (score ${result.score}, id ${reviewItemId ?? "n/a"}).`);
  }

  return reviewItemId ? { ...evaluation, reviewItemId } : evaluation;
}

function recordEvent(
  state: MonitorState,
  stage: MonitorStage,
  action: Exclude<MonitorAction, "allow">,
  result: ScoreResult,
  text: string,
  metadata: Record<string, unknown>,
  reviewItemId: string | undefined
): void {
  const timestamp = new Date().toISOString();
  const event: MonitorEvent = {
    id: shortHash({ stage, timestamp, index: state.events.length }),
    timestamp,
    stage,
    action,
    score: result.score,
    level: result.level,
    threats: [...result.threats],
    preview: state.config.log === "debug" ? truncate(text, PREVIEW_LIMIT) : "[redacted]",
    metadata: { ...metadata }
  };
  if (reviewItemId) {
    event.reviewItemId = reviewItemId;
  }
  state.events.push(event);
}

function truncate(value: string, max: number): string {
  return value.length > max ? value.slice(0, max) : value;
}
