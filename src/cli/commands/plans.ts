import { Command, Option } from "clipanion";
import { estimatePlanCost } from "../../plans/library.js";
import { RuntimeCommand } from "../runtime-command.js";

export class PlansListCommand extends RuntimeCommand {
  static override paths = [["plans", "list"]];

  static override usage = Command.Usage({
    description: "List stored plans with their success statistics",
    examples: [
      ["List every plan", "conductor plans list"],
      ["Only active plans for one intent", "conductor plans list --intent file.read --active"],
    ],
  });

  intent = Option.String("--intent", { description: "Restrict to one intent key" });
  active = Option.Boolean("--active", false, { description: "Hide retired plans" });

  async execute(): Promise<void> {
    await this.withRuntime(async (runtime) => {
      const patterns = await runtime.plans.listPatterns({
        ...(this.intent !== undefined ? { intentKey: this.intent } : {}),
        includeInactive: !this.active,
      });

      if (patterns.length === 0) {
        this.write("No stored plans.");
        return;
      }

      for (const { plan, stats } of patterns) {
        const rate = `${Math.round(stats.successRate * 100)}%`;
        const state = stats.active ? "active" : "retired";
        this.write(`${plan.intentKey}  ${plan.id}  ${plan.steps.length} steps  ${stats.usageCount} uses  ${rate}  ${state}`);
        this.write(`  ${plan.description}`);
      }
    });
  }
}

export class PlansTemplatesCommand extends RuntimeCommand {
  static override paths = [["plans", "templates"]];

  static override usage = Command.Usage({
    description: "List the built-in plans with their estimated cost",
    examples: [["List built-in plans", "conductor plans templates"]],
  });

  async execute(): Promise<void> {
    await this.withRuntime(async (runtime) => {
      const templates = runtime.templates?.list() ?? [];
      if (templates.length === 0) {
        this.write("No built-in plans.");
        return;
      }

      for (const plan of templates) {
        const cost = estimatePlanCost(plan);
        this.write(
          `${plan.intentKey}  ${cost.totalSteps} steps  ~${cost.estimatedTokens} tokens  $${cost.estimatedCostUsd.toFixed(4)}`,
        );
        this.write(`  ${plan.description}`);
      }
    });
  }
}
