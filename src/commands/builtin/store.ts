/**
 * Commands that write to the message store: flushing and thread tags.
 */

import { z } from "zod";
import type { Thread, UiContext } from "../../context/types.js";
import {
  CommandError,
  DISPATCH_ERROR_CODES,
  ReadOnlyStoreError,
  StoreLockedError,
} from "../../errors.js";
import { Command, type CommandBindings } from "../command.js";
import { currentViewOf, selectedThread, threadSchema } from "./support.js";

// ============================================================================
// FLUSH
// ============================================================================

export const flushParamsSchema = z.object({});

/**
 * Flush pending writes to the index. While another writer holds the lock
 * the flush is rescheduled every `general.flushRetryTimeout` seconds until
 * it goes through.
 */
export class FlushCommand extends Command<z.output<typeof flushParamsSchema>> {
  readonly help = "flush write operations to the index";

  constructor(params: z.input<typeof flushParamsSchema> = {}, bindings?: CommandBindings) {
    super("flush", flushParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    this.attempt(ui);
  }

  private attempt(ui: UiContext): void {
    try {
      ui.store.flush();
    } catch (error) {
      if (!(error instanceof StoreLockedError)) {
        throw error;
      }
      const timeout = ui.settings.general.flushRetryTimeout;
      ui.logger.info(`index locked, retrying in ${timeout}s`, { type: "apply", command: this.name });
      ui.setAlarm(timeout, () => this.retry(ui));
      ui.notify(`index locked, will try again in ${timeout} secs`);
      ui.update();
    }
  }

  /** Alarm callbacks run outside the dispatcher, so failures are reported here */
  private retry(ui: UiContext): void {
    try {
      this.attempt(ui);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      ui.logger.error(err, { type: "apply", command: this.name });
      ui.notify(err.message, { priority: "error" });
    }
  }
}

// ============================================================================
// TAGS
// ============================================================================

const READ_ONLY_MESSAGE = "index in read-only mode";

/**
 * Run a tag mutation; a read-only index is reported to the user and
 * yields false
 */
function mutateTags(ui: UiContext, mutate: () => void): boolean {
  try {
    mutate();
    return true;
  } catch (error) {
    if (error instanceof ReadOnlyStoreError) {
      ui.notify(READ_ONLY_MESSAGE, { priority: "error" });
      return false;
    }
    throw error;
  }
}

function requireThread(ui: UiContext, thread: Thread | undefined): Thread {
  const target = thread ?? selectedThread(ui);
  if (!target) {
    throw new CommandError(DISPATCH_ERROR_CODES.APPLY_FAILED, "no thread selected");
  }
  return target;
}

export const toggleTagParamsSchema = z.object({
  tag: z.string().min(1),
  thread: threadSchema.optional(),
});
export type ToggleTagParams = z.input<typeof toggleTagParamsSchema>;

export class ToggleTagCommand extends Command<z.output<typeof toggleTagParamsSchema>> {
  readonly help = "toggle a tag on the selected thread";

  constructor(params: ToggleTagParams, bindings?: CommandBindings) {
    super("toggletag", toggleTagParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const { tag } = this.params;
    const thread = requireThread(ui, this.params.thread);

    const changed = mutateTags(ui, () => {
      if (thread.getTags().includes(tag)) {
        thread.removeTags([tag]);
      } else {
        thread.addTags([tag]);
      }
    });
    if (!changed) return;

    await ui.applyCommand(new FlushCommand());

    const view = currentViewOf(ui, "search");
    const line = view?.getSelectedThreadline();
    if (!view || !line) return;

    line.rebuild();
    // drop the line once the thread no longer matches the buffer's query
    const query = `(${view.querystring}) AND thread:${thread.getThreadId()}`;
    if (ui.store.countMessages(query) === 0) {
      ui.logger.debug(`remove thread ${thread.getThreadId()} from search buffer`, {
        type: "apply",
        command: this.name,
      });
      view.removeThreadline(line);
      view.resultCount -= thread.getTotalMessages();
      ui.update();
    }
  }
}

export const retagParamsSchema = z.object({
  /** Comma-separated tags replacing the thread's current ones */
  tagsString: z.string().default(""),
});
export type RetagParams = z.input<typeof retagParamsSchema>;

export class RetagCommand extends Command<z.output<typeof retagParamsSchema>> {
  readonly help = "set the tags of the selected thread";

  constructor(params: RetagParams = {}, bindings?: CommandBindings) {
    super("retag", retagParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const thread = requireThread(ui, undefined);
    const tags = this.params.tagsString.split(",").filter((tag) => tag.length > 0);
    ui.logger.info(`retag ${thread.getThreadId()}: ${tags.join(",")}`, {
      type: "apply",
      command: this.name,
    });

    if (!mutateTags(ui, () => thread.setTags(tags))) return;

    await ui.applyCommand(new FlushCommand());
    currentViewOf(ui, "search")?.getSelectedThreadline()?.rebuild();
  }
}

export const retagPromptParamsSchema = z.object({});

export class RetagPromptCommand extends Command<z.output<typeof retagPromptParamsSchema>> {
  readonly help = "prompt to retag the selected thread";

  constructor(params: z.input<typeof retagPromptParamsSchema> = {}, bindings?: CommandBindings) {
    super("retagprompt", retagPromptParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const thread = requireThread(ui, undefined);
    await ui.commandPrompt(`retag ${thread.getTags().join(",")}`);
  }
}
