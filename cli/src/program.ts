import { Command } from "commander";
import { registerBlastRadiusCommand } from "./commands/blast-radius.js";
import { registerChangeRiskCommand } from "./commands/change-risk.js";
import { registerCompareCommand } from "./commands/compare.js";
import { registerRiskCommand } from "./commands/risk.js";
import { registerSimulateCommand } from "./commands/simulate.js";
import { registerSpofCommand } from "./commands/spof.js";
import { logger } from "./lib/logger.js";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("topdeck")
    .description("Query dependency risk, blast radius and failure simulations from the risk API")
    .version("1.0.0")
    .option("--json", "Print raw JSON results", false)
    .option("--quiet", "Suppress informational output", false)
    .hook("preAction", () => {
      const { json, quiet } = program.opts<{ json: boolean; quiet: boolean }>();
      logger.setOptions({ json, quiet });
    });

  registerBlastRadiusCommand(program);
  registerRiskCommand(program);
  registerSimulateCommand(program);
  registerSpofCommand(program);
  registerCompareCommand(program);
  registerChangeRiskCommand(program);

  return program;
}
