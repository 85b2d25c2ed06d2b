export type Severity = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW";
export type RiskLevel = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";
export type ReviewStatus = "pending" | "approved" | "rejected";
export type LogLevel = "safe" | "debug";

export const THREAT_CATEGORIES = [
  "prompt_injection",
  "jailbreak",
  "context_manipulation",
  "tool_misuse",
  "sql_injection",
  "command_injection",
  "file_manipulation",
  "network_exploit",
  "data_exfiltration"
] as const;

export type ThreatCategory = (typeof THREAT_CATEGORIES)[number];

// Highest first; index order doubles as the severity ranking.
export const SEVERITIES: readonly Severity[] = ["CRITICAL", "HIGH", "MEDIUM", "LOW"];

// Logger shape shared with host frameworks; every method is optional.
export type GuardrailLogger = {
  debug?: (message: string) => void;
  info?: (message: string) => void;
  warn?: (message: string) => void;
  error?: (message: string) => void;
};

export type Rule = {
  readonly id: string;
  readonly category: ThreatCategory;
  readonly pattern: RegExp;
  readonly severity: Severity;
  readonly description: string;
  /** Framework tags such as "OWASP-LLM02, CWE-89". */
  readonly references?: string;
};

// Uncompiled rule, as written in a catalog file or passed programmatically.
export type RuleDefinition = {
  id: string;
  category: string;
  pattern: string;
  severity: string;
  description: string;
  references?: string;
};

export type Threat = {
  id: string;
  category: ThreatCategory;
  severity: Severity;
  description: string;
  pattern: string;
};

export type ScoreResult = {
  score: number;
  level: RiskLevel;
  threats: Threat[];
  reasons: string[];
  recommendation: string;
  requiresReview: boolean;
};

export type ScoringWeights = {
  severityPoints: Record<Severity, number>;
  keywordWeight: number;
  mitigationWeight: number;
};

export type ReviewItem = {
  id: string;
  index: number;
  text: string;
  score: number;
  level: RiskLevel;
  threats: Threat[];
  reasons: string[];
  metadata: Record<string, unknown>;
  status: ReviewStatus;
  createdAt: string;
  updatedAt?: string;
};

export type ReviewSummary = {
  total: number;
  pending: number;
  approved: number;
  rejected: number;
};

export type AttackChain = {
  readonly name: string;
  readonly description: string;
  readonly steps: readonly string[];
  readonly attackType: string;
};

export type PayloadAttackSet = {
  readonly name: string;
  readonly category: string;
  readonly severity: Severity;
  readonly payloads: readonly string[];
};

export type FindingSeverity = Severity | "INFO";

export type AttackResult = {
  attackName: string;
  payload: string;
  response: string;
  vulnerable: boolean;
  severity: FindingSeverity;
  description: string;
};
