import { Command, Option } from "clipanion";
import { errorMessage } from "../../errors/app-error.js";
import { loadConfig, parseConfigText, readConfigSource } from "../../config/loader.js";

const REDACTED = "***REDACTED***";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration (secrets redacted)",
    examples: [["Show config", "conductor config show"]],
  });

  configPath = Option.String("--config,-c", { description: "Path to the config file" });

  async execute(): Promise<void> {
    let config;
    try {
      config = loadConfig(this.configPath);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    const redacted = {
      ...config,
      model: {
        ...config.model,
        ...(config.model.apiKey ? { apiKey: REDACTED } : {}),
        ...(config.model.local?.apiKey ? { local: { ...config.model.local, apiKey: REDACTED } } : {}),
      },
    };
    this.context.stdout.write(JSON.stringify(redacted, null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "conductor config validate"],
      ["Validate specific file", "conductor config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const source = readConfigSource(this.configFile);
    if (source.content === null) {
      this.context.stdout.write(`Config file not found: ${source.path}\n`);
      process.exitCode = 1;
      return;
    }

    try {
      parseConfigText(source.content, source.path);
      this.context.stdout.write(`Config is valid: ${source.path}\n`);
    } catch (err) {
      this.context.stdout.write(`Config is INVALID: ${source.path}\n  ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
