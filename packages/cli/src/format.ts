import type { AttackResult, Rule, ScoreResult, Threat, ThreatCategory } from "@guardrail/core";
import { describeGrade, type ChainScanSummary, type ScanReport } from "@guardrail/attacks";

export function formatThreat(threat: Threat): string {
  return `${threat.severity} ${threat.category} [${threat.id}] ${threat.description}`;
}

export function formatThreats(threats: Threat[]): string {
  if (threats.length === 0) {
    return "No threats detected.";
  }
  return [`Detected ${threats.length} threat(s):`, ...threats.map((threat) => `  ${formatThreat(threat)}`)].join("\n");
}

export function formatScore(result: ScoreResult): string {
  const lines = [
    `Score: ${result.score}/100 (${result.level})`,
    `Recommendation: ${result.recommendation}`,
    `Requires review: ${result.requiresReview ? "yes" : "no"}`
  ];
  if (result.reasons.length > 0) {
    lines.push("Reasons:", ...result.reasons.map((reason) => `  ${reason}`));
  }
  return lines.join("\n");
}

export function formatFinding(finding: AttackResult): string {
  return `- [${finding.severity}] ${finding.attackName}: ${finding.payload}`;
}

export function formatScanReport(report: ScanReport, quiet: boolean): string {
  const lines = [
    `Security grade: ${report.securityScore} (${describeGrade(report.securityScore)})`,
    `Tests: ${report.totalTests}, vulnerable: ${report.vulnerable}, safe: ${report.safe}`
  ];
  if (!quiet && report.findings.length > 0) {
    lines.push("Findings:", ...report.findings.map(formatFinding));
  }
  return lines.join("\n");
}

export function formatChainSummary(summary: ChainScanSummary): string {
  const lines = [
    `Chains: ${summary.totalChains}, vulnerable: ${summary.vulnerableChains}, safe: ${summary.safeChains}`
  ];
  for (const finding of summary.chainFindings) {
    const steps = finding.steps.filter((step) => step.stepVulnerable).length;
    lines.push(`- ${finding.chainName} (${finding.attackType}): ${steps}/${finding.steps.length} steps vulnerable`);
    for (const keywords of finding.matchedConjunctions) {
      lines.push(`    matched: ${keywords.join(" + ")}`);
    }
  }
  return lines.join("\n");
}

export function formatRuleGroups(groups: Map<ThreatCategory, Rule[]>): string {
  const lines: string[] = [];
  for (const [category, rules] of groups) {
    if (rules.length === 0) {
      continue;
    }
    lines.push(`${category} (${rules.length})`);
    for (const rule of rules) {
      lines.push(`  ${rule.id} ${rule.severity} ${rule.description}`);
    }
  }
  return lines.join("\n");
}
