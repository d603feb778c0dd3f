import { Command, Option } from "clipanion";
import { DEFAULT_NAMESPACE, factText } from "../../memory/types.js";
import { RuntimeCommand } from "../runtime-command.js";

export class MemoryListCommand extends RuntimeCommand {
  static override paths = [["memory", "list"]];

  static override usage = Command.Usage({
    description: "Show the remembered profile and action shortcuts",
    examples: [["Default namespace", "conductor memory list"]],
  });

  user = Option.String("--user", DEFAULT_NAMESPACE, { description: "Memory namespace" });

  async execute(): Promise<void> {
    await this.withRuntime(async (runtime) => {
      const summary = await runtime.memory.summary(this.user, 50);
      this.write(summary || "Nothing remembered yet.");
    });
  }
}

export class MemorySearchCommand extends RuntimeCommand {
  static override paths = [["memory", "search"]];

  static override usage = Command.Usage({
    description: "Score remembered facts against a query",
    examples: [["Search", "conductor memory search what is my name"]],
  });

  user = Option.String("--user", DEFAULT_NAMESPACE, { description: "Memory namespace" });
  query = Option.Rest({ required: 1 });

  async execute(): Promise<void> {
    await this.withRuntime(async (runtime) => {
      const hits = await runtime.memory.retrieve(this.query.join(" "), { namespace: this.user });
      if (hits.length === 0) {
        this.write("No matching memories.");
        return;
      }
      for (const hit of hits) {
        this.write(`${hit.score.toFixed(2)}  ${hit.fact.kind}  ${factText(hit.fact)}`);
      }
    });
  }
}
