import prompts from "prompts";
import type { PromptService } from "../ports/prompt.js";

/**
 * Real prompt service using the 'prompts' package.
 * A cancelled prompt (Ctrl-C, Esc) counts as "no answer".
 */
export const interactivePrompts: PromptService = {
  async confirm(message: string, initial = false): Promise<boolean> {
    const { value } = await prompts({
      type: "confirm",
      name: "value",
      message,
      initial,
    });
    return value === true;
  },

  async password(message: string): Promise<string | undefined> {
    const { value } = await prompts({
      type: "password",
      name: "value",
      message,
      validate: (input: string) => (input.trim().length > 0 ? true : "Value cannot be empty"),
    });
    return typeof value === "string" ? value.trim() : undefined;
  },
};
