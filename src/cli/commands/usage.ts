import { Command, Option } from "clipanion";
import { RuntimeCommand } from "../runtime-command.js";

export class UsageCommand extends RuntimeCommand {
  static override paths = [["usage"]];

  static override usage = Command.Usage({
    description: "Show token and cost totals per day",
    examples: [
      ["Last week", "conductor usage"],
      ["Last 30 days", "conductor usage --days 30"],
    ],
  });

  days = Option.String("--days", "7", { description: "Number of days to include" });

  async execute(): Promise<void> {
    const days = Number.parseInt(this.days, 10);
    if (!Number.isInteger(days) || days < 1) {
      this.write(`Invalid --days value: ${this.days}`);
      process.exitCode = 1;
      return;
    }

    await this.withRuntime(async (runtime) => {
      const summary = await runtime.usage.summarize(days);
      this.write(`Usage (${summary.period})`);
      this.write(`Requests: ${summary.requestCount}`);
      this.write(`Tokens:   ${summary.totalTokens}`);
      this.write(`Cost:     $${summary.totalCost.toFixed(4)}`);
      for (const day of summary.breakdown) {
        this.write(`  ${day.date}  ${day.requests} requests  ${day.tokens} tokens  $${day.cost.toFixed(4)}`);
      }
    });
  }
}
