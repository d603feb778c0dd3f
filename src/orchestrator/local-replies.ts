import type { LocalReplyTemplateConfig, LocalReplyTrigger } from "../config/types.js";
import { hasToolVerbs } from "./router.js";

export interface LocalReplyMatch {
  readonly templateId: string;
  readonly response: string;
}

export interface LocalReplyContext {
  readonly userId?: string;
  readonly now?: Date;
}

const GREETINGS = ["hi", "hello", "hey", "yo", "sup", "good morning", "good afternoon", "good evening"];
const ACKNOWLEDGEMENTS = ["thanks", "thank you", "thx", "ok", "okay", "got it", "cool"];

function startsWithPhrase(text: string, phrases: readonly string[]): boolean {
  return phrases.some((p) => text === p || text.startsWith(`${p} `) || text.startsWith(`${p}!`));
}

/**
 * Deterministic replies that need no model and no provider. Configured
 * templates are checked by priority, then the built-in greetings and
 * acknowledgements.
 */
export class LocalReplyEngine {
  private readonly templates: readonly LocalReplyTemplateConfig[];

  constructor(
    templates: readonly LocalReplyTemplateConfig[],
    private readonly builtins = true,
  ) {
    this.templates = [...templates].sort((a, b) => (b.priority ?? 0) - (a.priority ?? 0));
  }

  match(text: string, ctx: LocalReplyContext = {}): LocalReplyMatch | null {
    for (const tpl of this.templates) {
      if (this.triggerMatches(tpl.trigger, text)) {
        return { templateId: tpl.id, response: this.render(tpl.response, ctx) };
      }
    }
    return this.builtins ? this.builtin(text) : null;
  }

  private builtin(text: string): LocalReplyMatch | null {
    const msg = text.trim().toLowerCase();
    // "hey, read main.py" is a request, not a greeting
    if (hasToolVerbs(msg)) return null;
    if (startsWithPhrase(msg, GREETINGS)) return { templateId: "greeting", response: "Hey! How can I help?" };
    if (startsWithPhrase(msg, ACKNOWLEDGEMENTS)) return { templateId: "acknowledgement", response: "Got it." };
    return null;
  }

  private triggerMatches(trigger: LocalReplyTrigger, text: string): boolean {
    const msg = text.trim().toLowerCase();
    switch (trigger.type) {
      case "exact":
        return msg === trigger.pattern.trim().toLowerCase();
      case "prefix":
        return msg.startsWith(trigger.pattern.trim().toLowerCase());
      case "regex":
        return new RegExp(trigger.pattern, "i").test(text);
      case "keyword":
        return trigger.words.some((w) => msg.includes(w.toLowerCase()));
      case "command":
        return msg === `/${trigger.name.toLowerCase()}` || msg.startsWith(`/${trigger.name.toLowerCase()} `);
    }
  }

  private render(template: string, ctx: LocalReplyContext): string {
    const now = ctx.now ?? new Date();
    return template
      .replace(/\{user\}/g, ctx.userId ?? "there")
      .replace(/\{time\}/g, now.toLocaleTimeString())
      .replace(/\{date\}/g, now.toLocaleDateString());
  }
}
