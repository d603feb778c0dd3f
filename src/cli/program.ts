import { Builtins, Cli } from "clipanion";
import { AskCommand } from "./commands/ask.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { HistoryCommand } from "./commands/history.js";
import { MemoryListCommand, MemorySearchCommand } from "./commands/memory.js";
import { PlansListCommand, PlansTemplatesCommand } from "./commands/plans.js";
import { StatusCommand } from "./commands/status.js";
import { UsageCommand } from "./commands/usage.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Conductor",
    binaryName: "conductor",
    binaryVersion: "0.1.0",
  });

  cli.register(AskCommand);
  cli.register(HistoryCommand);
  cli.register(StatusCommand);

  // Plans and memory
  cli.register(PlansListCommand);
  cli.register(PlansTemplatesCommand);
  cli.register(MemoryListCommand);
  cli.register(MemorySearchCommand);

  cli.register(UsageCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}
