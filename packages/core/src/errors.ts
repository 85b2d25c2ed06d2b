import type { RiskLevel } from "./types.js";

// Malformed rule or attack catalog. Raised at load time and never recovered per call.
export class ConfigurationError extends Error {
  readonly source: string;
  readonly entry: string | undefined;

  constructor(message: string, params: { source: string; entry?: string; cause?: unknown }) {
    super(message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "ConfigurationError";
    this.source = params.source;
    this.entry = params.entry;
  }
}

export type BlockedInputDetails = {
  stage: string;
  score: number;
  level: RiskLevel;
  recommendation: string;
  reviewItemId?: string;
};

// Hard stop for the host's forward action.
export class BlockedInputError extends Error {
  readonly stage: string;
  readonly score: number;
  readonly level: RiskLevel;
  readonly recommendation: string;
  readonly reviewItemId: string | undefined;

  constructor(details: BlockedInputDetails) {
    super(
      `Blocked ${details.level} input at ${details.stage} (score ${details.score}/100). ${details.recommendation}`
    );
    this.name = "BlockedInputError";
    this.stage = details.stage;
    this.score = details.score;
    this.level = details.level;
    this.recommendation = details.recommendation;
    this.reviewItemId = details.reviewItemId;
  }
}
