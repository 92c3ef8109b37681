/**
 * Command Kinds
 *
 * The closed set of command kinds the registry can point at. Each kind
 * pairs the parameter schema of its command class with a constructor, so
 * the factory can validate a merged parameter blob and build the command
 * without knowing the class.
 */

import type { z } from "zod";
import {
  CommandPromptCommand,
  ExitCommand,
  noParamsSchema,
  PromptCommand,
  promptParamsSchema,
  RefreshCommand,
  ReplCommand,
} from "./builtin/app.js";
import { ComposeCommand, composeParamsSchema } from "./builtin/compose.js";
import {
  EnvelopeEditCommand,
  envelopeEditParamsSchema,
  EnvelopeOpenCommand,
  envelopeOpenParamsSchema,
  EnvelopeSendCommand,
  envelopeSendParamsSchema,
  EnvelopeSetCommand,
  envelopeSetParamsSchema,
} from "./builtin/envelope.js";
import { EditCommand, editParamsSchema, ExternalCommand, externalParamsSchema } from "./builtin/external.js";
import {
  OpenThreadCommand,
  openThreadParamsSchema,
  RefineCommand,
  refineParamsSchema,
  RefinePromptCommand,
  refinePromptParamsSchema,
  SearchCommand,
  searchParamsSchema,
  TaglistSelectCommand,
  taglistSelectParamsSchema,
} from "./builtin/search.js";
import {
  FlushCommand,
  flushParamsSchema,
  RetagCommand,
  retagParamsSchema,
  RetagPromptCommand,
  retagPromptParamsSchema,
  ToggleTagCommand,
  toggleTagParamsSchema,
} from "./builtin/store.js";
import {
  BounceCommand,
  bounceParamsSchema,
  FoldCommand,
  foldParamsSchema,
  ForwardCommand,
  forwardParamsSchema,
  ReplyCommand,
  replyParamsSchema,
} from "./builtin/thread.js";
import {
  BufferCloseCommand,
  bufferCloseParamsSchema,
  BufferFocusCommand,
  bufferFocusParamsSchema,
  OpenBufferListCommand,
  openBufferListParamsSchema,
  TagListCommand,
  tagListParamsSchema,
} from "./builtin/views.js";
import type { Command, CommandBindings } from "./command.js";

export interface CommandKindSpec<S extends z.ZodTypeAny> {
  readonly schema: S;
  /** Validate raw parameters (throws ZodError) and construct the command */
  build(raw: unknown, bindings: CommandBindings): Command;
}

function defineKind<S extends z.ZodTypeAny>(
  schema: S,
  create: (params: z.output<S>, bindings: CommandBindings) => Command
): CommandKindSpec<S> {
  return {
    schema,
    build: (raw, bindings) => create(schema.parse(raw), bindings),
  };
}

export const COMMAND_KINDS = {
  exit: defineKind(noParamsSchema, (params, bindings) => new ExitCommand(params, bindings)),
  openThread: defineKind(openThreadParamsSchema, (params, bindings) => new OpenThreadCommand(params, bindings)),
  search: defineKind(searchParamsSchema, (params, bindings) => new SearchCommand(params, bindings)),
  prompt: defineKind(promptParamsSchema, (params, bindings) => new PromptCommand(params, bindings)),
  commandPrompt: defineKind(noParamsSchema, (params, bindings) => new CommandPromptCommand(params, bindings)),
  refresh: defineKind(noParamsSchema, (params, bindings) => new RefreshCommand(params, bindings)),
  external: defineKind(externalParamsSchema, (params, bindings) => new ExternalCommand(params, bindings)),
  edit: defineKind(editParamsSchema, (params, bindings) => new EditCommand(params, bindings)),
  repl: defineKind(noParamsSchema, (params, bindings) => new ReplCommand(params, bindings)),
  bufferClose: defineKind(bufferCloseParamsSchema, (params, bindings) => new BufferCloseCommand(params, bindings)),
  bufferFocus: defineKind(bufferFocusParamsSchema, (params, bindings) => new BufferFocusCommand(params, bindings)),
  openBufferList: defineKind(
    openBufferListParamsSchema,
    (params, bindings) => new OpenBufferListCommand(params, bindings)
  ),
  tagList: defineKind(tagListParamsSchema, (params, bindings) => new TagListCommand(params, bindings)),
  flush: defineKind(flushParamsSchema, (params, bindings) => new FlushCommand(params, bindings)),
  toggleTag: defineKind(toggleTagParamsSchema, (params, bindings) => new ToggleTagCommand(params, bindings)),
  retagPrompt: defineKind(retagPromptParamsSchema, (params, bindings) => new RetagPromptCommand(params, bindings)),
  retag: defineKind(retagParamsSchema, (params, bindings) => new RetagCommand(params, bindings)),
  refine: defineKind(refineParamsSchema, (params, bindings) => new RefineCommand(params, bindings)),
  refinePrompt: defineKind(
    refinePromptParamsSchema,
    (params, bindings) => new RefinePromptCommand(params, bindings)
  ),
  reply: defineKind(replyParamsSchema, (params, bindings) => new ReplyCommand(params, bindings)),
  forward: defineKind(forwardParamsSchema, (params, bindings) => new ForwardCommand(params, bindings)),
  bounce: defineKind(bounceParamsSchema, (params, bindings) => new BounceCommand(params, bindings)),
  fold: defineKind(foldParamsSchema, (params, bindings) => new FoldCommand(params, bindings)),
  compose: defineKind(composeParamsSchema, (params, bindings) => new ComposeCommand(params, bindings)),
  envelopeOpen: defineKind(
    envelopeOpenParamsSchema,
    (params, bindings) => new EnvelopeOpenCommand(params, bindings)
  ),
  envelopeEdit: defineKind(
    envelopeEditParamsSchema,
    (params, bindings) => new EnvelopeEditCommand(params, bindings)
  ),
  envelopeSet: defineKind(envelopeSetParamsSchema, (params, bindings) => new EnvelopeSetCommand(params, bindings)),
  envelopeSend: defineKind(
    envelopeSendParamsSchema,
    (params, bindings) => new EnvelopeSendCommand(params, bindings)
  ),
  taglistSelect: defineKind(
    taglistSelectParamsSchema,
    (params, bindings) => new TaglistSelectCommand(params, bindings)
  ),
};

export type CommandKind = keyof typeof COMMAND_KINDS;

/** Parameter struct a kind accepts, before schema defaults apply */
export type ParamsOf<K extends CommandKind> = z.input<(typeof COMMAND_KINDS)[K]["schema"]>;

export const COMMAND_KIND_NAMES = Object.keys(COMMAND_KINDS).filter(isCommandKind);

export function isCommandKind(value: string): value is CommandKind {
  return Object.prototype.hasOwnProperty.call(COMMAND_KINDS, value);
}
