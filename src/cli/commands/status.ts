import { Command } from "clipanion";
import { resolveConfigPath, resolveDatabasePath } from "../../config/paths.js";
import { RuntimeCommand } from "../runtime-command.js";

export class StatusCommand extends RuntimeCommand {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show configuration, model health, providers and stored plans",
    examples: [["Show status", "conductor status"]],
  });

  async execute(): Promise<void> {
    await this.withRuntime(async (runtime) => {
      const { config } = runtime;
      this.write("Conductor Status");
      this.write("----------------");
      this.write(`Config path: ${resolveConfigPath(this.configPath)}`);
      this.write(`Database:    ${resolveDatabasePath(config.storage.path)}`);

      if (!runtime.gateway) {
        this.write("Model:       none (degraded mode)");
      } else {
        this.write(`Model:       ${config.model.provider} (${config.model.model}), ${config.gateway.routing} routing`);
        for (const h of runtime.gateway.health()) {
          this.write(`  ${h.provider} (tier ${h.tier}): ${h.state}, ${h.consecutiveFailures} consecutive failures`);
        }
      }

      const providers = runtime.registry.describe();
      if (providers.length === 0) {
        this.write("Providers:   (none enabled)");
      } else {
        this.write("Providers:");
        for (const p of providers) {
          this.write(`  ${p.name}: ${p.actions.join(", ")}`);
        }
      }

      const patterns = await runtime.plans.listPatterns();
      const active = patterns.filter((p) => p.stats.active).length;
      this.write(`Plans:       ${patterns.length} stored, ${active} active`);
      this.write(`Memory:      ${config.memory.enabled ? "enabled" : "disabled"}`);
    });
  }
}
