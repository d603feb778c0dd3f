import { Command, Option } from "clipanion";
import { createRuntimeFromFile, type RuntimeContext } from "../runtime/lifecycle.js";
import { errorMessage } from "../errors/app-error.js";

/** Base for commands that need the wired runtime. The runtime is shut down after every run. */
export abstract class RuntimeCommand extends Command {
  configPath = Option.String("--config,-c", {
    description: "Path to the config file",
  });

  protected async withRuntime(fn: (runtime: RuntimeContext) => Promise<void>): Promise<void> {
    let runtime: RuntimeContext;
    try {
      runtime = createRuntimeFromFile(this.configPath);
    } catch (err) {
      this.context.stdout.write(`Failed to start: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }
    try {
      await fn(runtime);
    } finally {
      await runtime.shutdown();
    }
  }

  protected write(line = ""): void {
    this.context.stdout.write(`${line}\n`);
  }
}
