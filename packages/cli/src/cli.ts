#!/usr/bin/env node
import { Command } from "commander";
import { registerGuardrailCli } from "./commands.js";

// Standalone CLI entrypoint.
const program = new Command();
program.name("guardrail").description("Threat detection and risk scoring for agent inputs");
registerGuardrailCli(program, { logger: console });
program.parse(process.argv);
