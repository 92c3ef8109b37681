/**
 * Buffer management: close, focus and the buffer/tag lists.
 */

import { z } from "zod";
import type { UiContext, View } from "../../context/types.js";
import { Command, type CommandBindings } from "../command.js";
import { currentViewOf, tagFilterSchema, viewFilterSchema, viewSchema } from "./support.js";

// ============================================================================
// CLOSE / FOCUS
// ============================================================================

export const bufferCloseParamsSchema = z.object({
  buffer: viewSchema.optional(),
  /** Close the buffer selected in the bufferlist instead */
  focussed: z.boolean().default(false),
});
export type BufferCloseParams = z.input<typeof bufferCloseParamsSchema>;

export class BufferCloseCommand extends Command<z.output<typeof bufferCloseParamsSchema>> {
  readonly help = "close a buffer";

  constructor(params: BufferCloseParams = {}, bindings?: CommandBindings) {
    super("close", bufferCloseParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const target = this.params.focussed
      ? currentViewOf(ui, "bufferlist")?.getSelectedView()
      : (this.params.buffer ?? ui.currentView);
    if (!target) {
      ui.logger.debug("no buffer to close", { type: "apply", command: this.name });
      return;
    }

    ui.close(target);
    const current = ui.currentView;
    if (current) {
      ui.focus(current);
    }
  }
}

export const bufferFocusParamsSchema = z.object({
  buffer: viewSchema.optional(),
  /** Step through the buffer ring relative to the current buffer */
  offset: z.number().int().default(0),
});
export type BufferFocusParams = z.input<typeof bufferFocusParamsSchema>;

export class BufferFocusCommand extends Command<z.output<typeof bufferFocusParamsSchema>> {
  readonly help = "focus a buffer";

  constructor(params: BufferFocusParams = {}, bindings?: CommandBindings) {
    super("openfocussed", bufferFocusParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const target = this.params.offset !== 0 ? this.stepFrom(ui) : this.selected(ui);
    if (target) {
      ui.focus(target);
    }
  }

  private stepFrom(ui: UiContext): View | undefined {
    const count = ui.views.length;
    if (count === 0) return undefined;
    const current = ui.currentView;
    // a current view that is no longer open steps from the first buffer
    const index = current ? Math.max(ui.views.indexOf(current), 0) : 0;
    // modulo that stays positive for negative offsets
    const next = (((index + this.params.offset) % count) + count) % count;
    return ui.views[next];
  }

  private selected(ui: UiContext): View | undefined {
    return this.params.buffer ?? currentViewOf(ui, "bufferlist")?.getSelectedView();
  }
}

// ============================================================================
// LISTS
// ============================================================================

export const openBufferListParamsSchema = z.object({
  filter: viewFilterSchema.optional(),
});
export type OpenBufferListParams = z.input<typeof openBufferListParamsSchema>;

export class OpenBufferListCommand extends Command<z.output<typeof openBufferListParamsSchema>> {
  readonly help = "open a list of active buffers";

  constructor(params: OpenBufferListParams = {}, bindings?: CommandBindings) {
    super("bufferlist", openBufferListParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const [existing] = ui.viewsOfType("bufferlist");
    if (existing) {
      ui.focus(existing);
      return;
    }
    ui.open({ type: "bufferlist", filter: this.params.filter });
  }
}

export const tagListParamsSchema = z.object({
  filter: tagFilterSchema.optional(),
});
export type TagListParams = z.input<typeof tagListParamsSchema>;

export class TagListCommand extends Command<z.output<typeof tagListParamsSchema>> {
  readonly help = "open a list of all tags in the index";

  constructor(params: TagListParams = {}, bindings?: CommandBindings) {
    super("taglist", tagListParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const tags = ui.store.getAllTags();
    const view = ui.open({ type: "taglist", tags, filter: this.params.filter });
    ui.focus(view);
  }
}
