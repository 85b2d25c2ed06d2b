import type { AttackResult, PayloadAttackSet } from "@guardrail/core";
import { describeIndicator, detectCompromise } from "./indicators.js";
import { simulateResponse, type ResponseSimulator } from "./simulator.js";

export type PayloadAttackOptions = {
  simulator?: ResponseSimulator;
};

// Fire every payload of a set at the agent and judge each reply on its own.
export function runPayloadAttacks(
  set: PayloadAttackSet,
  agentPrompt: string,
  options: PayloadAttackOptions = {}
): AttackResult[] {
  const simulator = options.simulator ?? simulateResponse;
  return set.payloads.map((payload) => {
    const response = simulator(agentPrompt, payload);
    const indicator = detectCompromise(response, agentPrompt);
    return {
      attackName: set.name,
      payload,
      response,
      vulnerable: indicator !== null,
      severity: indicator ? set.severity : "INFO",
      description: describeIndicator(indicator)
    };
  });
}
