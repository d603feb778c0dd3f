import type { ToolSpec } from "../model/types.js";
import { toolName } from "../model/types.js";
import type { CapabilityProvider } from "./types.js";

export interface ProviderSummary {
  readonly name: string;
  readonly actions: readonly string[];
}

/** Immutable once constructed; build a new registry to change the provider set. */
export class ProviderRegistry {
  private readonly providers: ReadonlyMap<string, CapabilityProvider>;

  constructor(providers: readonly CapabilityProvider[]) {
    const map = new Map<string, CapabilityProvider>();
    for (const provider of providers) {
      const name = provider.name();
      if (map.has(name)) {
        throw new Error(`Capability provider already registered: ${name}`);
      }
      map.set(name, provider);
    }
    this.providers = map;
  }

  get(name: string): CapabilityProvider | undefined {
    return this.providers.get(name);
  }

  /** True when the provider exists and whitelists the action. */
  has(provider: string, action: string): boolean {
    const p = this.providers.get(provider);
    return p !== undefined && p.capabilities().has(action) && p.validateAction(action);
  }

  list(): CapabilityProvider[] {
    return [...this.providers.values()];
  }

  get size(): number {
    return this.providers.size;
  }

  describe(): ProviderSummary[] {
    return this.list().map((p) => ({ name: p.name(), actions: [...p.capabilities()].sort() }));
  }

  /** Every `provider.action` pair, for prompts and guardrail messages. */
  actionNames(): string[] {
    return this.describe().flatMap((p) => p.actions.map((a) => `${p.name}.${a}`));
  }

  toolSpecs(): ToolSpec[] {
    const specs: ToolSpec[] = [];
    for (const provider of this.list()) {
      for (const action of [...provider.capabilities()].sort()) {
        const described = provider.describeAction?.(action);
        const properties: Record<string, { type: string; description: string }> = {};
        const required: string[] = [];
        for (const [param, spec] of Object.entries(described?.params ?? {})) {
          properties[param] = { type: spec.type, description: spec.description };
          if (spec.required) required.push(param);
        }
        specs.push({
          name: toolName(provider.name(), action),
          description: described?.description ?? `${provider.name()} ${action}`,
          parameters: { type: "object", properties, required },
        });
      }
    }
    return specs;
  }
}
