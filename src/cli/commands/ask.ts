import { Command, Option } from "clipanion";
import { intentKey } from "../../classifier/types.js";
import { formatExecutionSummary } from "../../orchestrator/prompts.js";
import type { ProcessResult, ThreadContext } from "../../orchestrator/orchestrator.js";
import { RuntimeCommand } from "../runtime-command.js";

export class AskCommand extends RuntimeCommand {
  static override paths = [["ask"]];

  static override usage = Command.Usage({
    description: "Send one request through the pipeline and print the reply",
    examples: [
      ["Ask a question", "conductor ask what is in README.md"],
      ["Stream the reply", "conductor ask --stream summarize src/index.ts"],
      ["Machine-readable result", "conductor ask --json list the files in src"],
    ],
  });

  stream = Option.Boolean("--stream", false, { description: "Print the reply as it is generated" });
  json = Option.Boolean("--json", false, { description: "Print the full result as JSON" });
  thread = Option.String("--thread", "cli", { description: "Thread id for history and usage accounting" });
  team = Option.Boolean("--team", false, { description: "Keep the turn in the shared team history" });
  user = Option.String("--user", { description: "Memory namespace" });
  text = Option.Rest({ required: 1 });

  async execute(): Promise<void> {
    const request = this.text.join(" ");
    const thread: ThreadContext = {
      threadId: this.thread,
      mode: this.team ? "team" : "personal",
      ...(this.user !== undefined ? { userId: this.user } : {}),
    };

    await this.withRuntime(async (runtime) => {
      if (this.stream && !this.json) {
        await runtime.orchestrator.processStream(request, thread, (chunk) => {
          this.context.stdout.write(chunk);
        });
        this.write();
        return;
      }

      const result = await runtime.orchestrator.process(request, thread);
      this.write(this.json ? JSON.stringify(toJson(result), null, 2) : result.message);
    });
  }
}

function toJson(result: ProcessResult): Record<string, unknown> {
  return {
    message: result.message,
    route: result.route,
    intent: result.intent ? intentKey(result.intent) : null,
    confidence: result.intent?.confidence ?? null,
    mode: result.mode ?? null,
    planSource: result.planSource ?? null,
    tier: result.tier,
    tokensUsed: result.tokensUsed,
    durationMs: result.durationMs,
    degraded: result.degraded,
    execution: result.executionTrace ? formatExecutionSummary(result.executionTrace) : null,
  };
}
