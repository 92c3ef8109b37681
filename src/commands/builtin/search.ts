/**
 * Search buffers: opening, refining and drilling into threads.
 */

import { z } from "zod";
import type { UiContext } from "../../context/types.js";
import { CommandError, DISPATCH_ERROR_CODES } from "../../errors.js";
import { Command, type CommandBindings } from "../command.js";
import { currentViewOf, requireView, threadSchema } from "./support.js";

export const searchParamsSchema = z.object({
  query: z.string(),
  /** Open a new buffer even when one with this query exists */
  forceNew: z.boolean().default(false),
});
export type SearchParams = z.input<typeof searchParamsSchema>;

export class SearchCommand extends Command<z.output<typeof searchParamsSchema>> {
  readonly help = "open a new search buffer";

  constructor(params: SearchParams, bindings?: CommandBindings) {
    super("search", searchParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const { query, forceNew } = this.params;
    if (!forceNew) {
      // last match wins when several buffers share the query
      const existing = ui.viewsOfType("search").filter((view) => view.querystring === query).pop();
      if (existing) {
        ui.focus(existing);
        return;
      }
    }
    ui.open({ type: "search", query });
  }
}

export const refineParamsSchema = z.object({
  query: z.string().optional(),
});
export type RefineParams = z.input<typeof refineParamsSchema>;

export class RefineCommand extends Command<z.output<typeof refineParamsSchema>> {
  readonly help = "refine the query of the current search buffer";

  constructor(params: RefineParams = {}, bindings?: CommandBindings) {
    super("refine", refineParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const view = requireView(ui, "search", this.name);
    const { query } = this.params;
    if (query === undefined || query === view.querystring) {
      return;
    }
    view.querystring = query;
    view.rebuild();
    ui.update();
  }
}

export const refinePromptParamsSchema = z.object({});

export class RefinePromptCommand extends Command<z.output<typeof refinePromptParamsSchema>> {
  readonly help = "prompt to change the current search buffer's query";

  constructor(params: z.input<typeof refinePromptParamsSchema> = {}, bindings?: CommandBindings) {
    super("refineprompt", refinePromptParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const view = requireView(ui, "search", this.name);
    await ui.commandPrompt(`refine ${view.querystring}`);
  }
}

export const openThreadParamsSchema = z.object({
  thread: threadSchema.optional(),
});
export type OpenThreadParams = z.input<typeof openThreadParamsSchema>;

export class OpenThreadCommand extends Command<z.output<typeof openThreadParamsSchema>> {
  readonly help = "open a new thread buffer";

  constructor(params: OpenThreadParams = {}, bindings?: CommandBindings) {
    super("openthread", openThreadParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const thread = this.params.thread ?? currentViewOf(ui, "search")?.getSelectedThread();
    if (!thread) {
      throw new CommandError(DISPATCH_ERROR_CODES.APPLY_FAILED, "no thread selected");
    }
    ui.logger.info(`open thread view for ${thread.getThreadId()}`, {
      type: "apply",
      command: this.name,
    });
    ui.open({ type: "thread", thread });
  }
}

export const taglistSelectParamsSchema = z.object({});

/**
 * Search for the tag under the cursor in a taglist
 */
export class TaglistSelectCommand extends Command<z.output<typeof taglistSelectParamsSchema>> {
  readonly help = "search for the selected tag";

  constructor(params: z.input<typeof taglistSelectParamsSchema> = {}, bindings?: CommandBindings) {
    super("select", taglistSelectParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const tag = requireView(ui, "taglist", this.name).getSelectedTag();
    if (tag === undefined) {
      return;
    }
    await ui.applyCommand(new SearchCommand({ query: `tag:${tag}` }));
  }
}
