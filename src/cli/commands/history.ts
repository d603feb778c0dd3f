import { Command, Option } from "clipanion";
import { RuntimeCommand } from "../runtime-command.js";

export class HistoryCommand extends RuntimeCommand {
  static override paths = [["history"]];

  static override usage = Command.Usage({
    description: "Show the stored turns of a thread",
    examples: [
      ["Default thread", "conductor history"],
      ["Last 5 turns of the team thread", "conductor history --thread standup --team --limit 5"],
    ],
  });

  thread = Option.String("--thread", "cli", { description: "Thread id" });
  team = Option.Boolean("--team", false, { description: "Read the shared team history" });
  limit = Option.String("--limit", "20", { description: "Most recent turns to show" });

  async execute(): Promise<void> {
    const limit = Number.parseInt(this.limit, 10);
    if (!Number.isInteger(limit) || limit < 1) {
      this.write(`Invalid --limit value: ${this.limit}`);
      process.exitCode = 1;
      return;
    }

    await this.withRuntime(async (runtime) => {
      if (!runtime.conversations) {
        this.write("Conversation history is disabled.");
        return;
      }
      const turns = await runtime.conversations.history(this.thread, {
        mode: this.team ? "team" : "personal",
        limit,
      });
      if (turns.length === 0) {
        this.write("No conversation yet.");
        return;
      }
      for (const turn of turns) {
        this.write(`[${turn.seq}] You: ${turn.user}`);
        this.write(`    Assistant: ${turn.assistant}`);
      }
    });
  }
}
