import type { RiskLevel, ScoreResult, ScoringWeights, Severity } from "@guardrail/core";
import { createDetector, type Detector } from "./detector.js";

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  severityPoints: {
    CRITICAL: 60,
    HIGH: 40,
    MEDIUM: 20,
    LOW: 10
  },
  keywordWeight: 11,
  mitigationWeight: 15
};

// Words that push an otherwise ambiguous request toward malicious intent.
export const AGGRAVATING_KEYWORDS: readonly string[] = [
  "email",
  "send",
  "execute",
  "delete",
  "drop",
  "reveal",
  "exfiltrate",
  "steal",
  "hack",
  "bypass",
  "exploit",
  "secret",
  "password",
  "credential",
  "token",
  "key"
];

// Phrases that signal a legitimate reset rather than an override.
export const MITIGATING_PHRASES: readonly string[] = [
  "start fresh",
  "reset",
  "clear history",
  "begin again",
  "new session",
  "start over",
  "clear context"
];

const RECOMMENDATIONS: Record<RiskLevel, string> = {
  LOW: "ALLOW - Low risk, safe to proceed",
  MEDIUM: "REVIEW - Moderate risk, human review recommended",
  HIGH: "BLOCK - High risk, block with manual override option",
  CRITICAL: "BLOCK - Critical risk, always block"
};

export type RiskScorer = {
  score: (text: string | null | undefined) => ScoreResult;
  shouldBlock: (result: ScoreResult) => boolean;
  requiresHumanReview: (result: ScoreResult) => boolean;
};

export type ScoringWeightOverrides = {
  severityPoints?: Partial<Record<Severity, number>>;
  keywordWeight?: number;
  mitigationWeight?: number;
};

export type RiskScorerOptions = {
  detector?: Detector;
  weights?: ScoringWeightOverrides;
  aggravatingKeywords?: readonly string[];
  mitigatingPhrases?: readonly string[];
};

let defaultScorer: RiskScorer | undefined;

/**
 * Create a scorer that turns detector hits and keyword heuristics into a
 * bounded 0-100 score. Every adjustment is recorded in `reasons`, in the
 * order it was applied.
 */
export function createRiskScorer(options: RiskScorerOptions = {}): RiskScorer {
  const detector = options.detector ?? createDetector();
  const weights = mergeWeights(options.weights);
  const aggravating = (options.aggravatingKeywords ?? AGGRAVATING_KEYWORDS).map((kw) => kw.toLowerCase());
  const mitigating = (options.mitigatingPhrases ?? MITIGATING_PHRASES).map((kw) => kw.toLowerCase());

  const score = (text: string | null | undefined): ScoreResult => {
    const input = text ?? "";
    const threats = detector.scan(input);
    const reasons: string[] = [];
    let total = 0;

    for (const threat of threats) {
      const points = weights.severityPoints[threat.severity];
      total += points;
      reasons.push(`+${points}: [${threat.id}] ${threat.description}`);
    }

    const lowered = input.toLowerCase();
    const aggravatingFound = distinct(aggravating.filter((kw) => lowered.includes(kw)));
    if (aggravatingFound.length > 0) {
      const bonus = aggravatingFound.length * weights.keywordWeight;
      total += bonus;
      reasons.push(`+${bonus}: Aggravating keywords: ${aggravatingFound.join(", ")}`);
    }

    const mitigatingFound = distinct(mitigating.filter((phrase) => lowered.includes(phrase)));
    if (mitigatingFound.length > 0) {
      const reduction = mitigatingFound.length * weights.mitigationWeight;
      total = Math.max(0, total - reduction);
      reasons.push(`-${reduction}: Legitimate intent: ${mitigatingFound.join(", ")}`);
    }

    const clamped = clampScore(total);
    const level = riskLevelForScore(clamped);
    return {
      score: clamped,
      level,
      threats,
      reasons,
      recommendation: recommendationFor(level),
      requiresReview: level === "MEDIUM" || level === "HIGH"
    };
  };

  return { score, shouldBlock, requiresHumanReview };
}

// Score text with the default detector and weights.
export function scoreText(text: string | null | undefined): ScoreResult {
  if (!defaultScorer) {
    defaultScorer = createRiskScorer();
  }
  return defaultScorer.score(text);
}

export function shouldBlock(result: ScoreResult): boolean {
  return result.level === "HIGH" || result.level === "CRITICAL";
}

export function requiresHumanReview(result: ScoreResult): boolean {
  return result.requiresReview;
}

// Bands are inclusive on their upper bound.
export function riskLevelForScore(score: number): RiskLevel {
  if (score <= 30) {
    return "LOW";
  }
  if (score <= 60) {
    return "MEDIUM";
  }
  if (score <= 80) {
    return "HIGH";
  }
  return "CRITICAL";
}

export function recommendationFor(level: RiskLevel): string {
  return RECOMMENDATIONS[level];
}

export function mergeWeights(overrides: ScoringWeightOverrides = {}): ScoringWeights {
  return {
    severityPoints: { ...DEFAULT_SCORING_WEIGHTS.severityPoints, ...overrides.severityPoints },
    keywordWeight: overrides.keywordWeight ?? DEFAULT_SCORING_WEIGHTS.keywordWeight,
    mitigationWeight: overrides.mitigationWeight ?? DEFAULT_SCORING_WEIGHTS.mitigationWeight
  };
}

function clampScore(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)));
}

function distinct(values: string[]): string[] {
  return Array.from(new Set(values));
}
