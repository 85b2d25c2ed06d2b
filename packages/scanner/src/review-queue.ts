import { shortHash, type ReviewItem, type ReviewStatus, type ReviewSummary, type ScoreResult } from "@guardrail/core";

/**
 * Append-only in-memory ledger of inputs awaiting human adjudication.
 *
 * Items are never removed. A pending item moves to `approved` (false
 * positive) or `rejected` (confirmed malicious) only through an explicit
 * call, and stays there.
 *
 * Index-based adjudication treats an out-of-range index as a no-op and
 * reports it through the boolean return value instead of throwing. Callers
 * that interleave appends with adjudication should use the `*ById` variants.
 */
export class ReviewQueue {
  private readonly ledger: ReviewItem[] = [];

  add(text: string, result: ScoreResult, metadata: Record<string, unknown> = {}): ReviewItem {
    const index = this.ledger.length;
    const createdAt = new Date().toISOString();
    const item: ReviewItem = {
      id: shortHash({ index, text, score: result.score, createdAt }),
      index,
      text,
      score: result.score,
      level: result.level,
      threats: [...result.threats],
      reasons: [...result.reasons],
      metadata: { ...metadata },
      status: "pending",
      createdAt
    };
    this.ledger.push(item);
    return cloneItem(item);
  }

  getPending(): ReviewItem[] {
    return this.ledger.filter((item) => item.status === "pending").map(cloneItem);
  }

  items(): ReviewItem[] {
    return this.ledger.map(cloneItem);
  }

  approve(index: number): boolean {
    return this.transition(this.ledger[index], "approved");
  }

  reject(index: number): boolean {
    return this.transition(this.ledger[index], "rejected");
  }

  approveById(id: string): boolean {
    return this.transition(this.find(id), "approved");
  }

  rejectById(id: string): boolean {
    return this.transition(this.find(id), "rejected");
  }

  summary(): ReviewSummary {
    const counts: ReviewSummary = { total: this.ledger.length, pending: 0, approved: 0, rejected: 0 };
    for (const item of this.ledger) {
      counts[item.status] += 1;
    }
    return counts;
  }

  private find(id: string): ReviewItem | undefined {
    return this.ledger.find((item) => item.id === id);
  }

  private transition(item: ReviewItem | undefined, status: Exclude<ReviewStatus, "pending">): boolean {
    if (!item || item.status !== "pending") {
      return false;
    }
    item.status = status;
    item.updatedAt = new Date().toISOString();
    return true;
  }
}

// Nested arrays and metadata are copied too, so callers cannot edit the ledger.
function cloneItem(item: ReviewItem): ReviewItem {
  return {
    ...item,
    threats: item.threats.map((threat) => ({ ...threat })),
    reasons: [...item.reasons],
    metadata: { ...item.metadata }
  };
}
