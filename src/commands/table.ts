/**
 * Built-in command table
 */

import { entry, type CommandTable } from "./registry.js";

export const DEFAULT_COMMAND_TABLE: CommandTable = {
  search: {
    refine: entry("refine"),
    refineprompt: entry("refinePrompt"),
    openthread: entry("openThread"),
    toggletag: entry("toggleTag", { tag: "inbox" }),
    retag: entry("retag"),
    retagprompt: entry("retagPrompt"),
  },
  envelope: {
    send: entry("envelopeSend"),
    reedit: entry("envelopeEdit"),
    subject: entry("envelopeSet", { key: "Subject" }),
    to: entry("envelopeSet", { key: "To" }),
  },
  bufferlist: {
    closefocussed: entry("bufferClose", { focussed: true }),
    openfocussed: entry("bufferFocus"),
  },
  taglist: {
    select: entry("taglistSelect"),
  },
  thread: {
    reply: entry("reply"),
    groupreply: entry("reply", { groupReply: true }),
    forward: entry("forward"),
    bounce: entry("bounce"),
    fold: entry("fold", { visible: true }),
    unfold: entry("fold", { visible: false }),
  },
  global: {
    bnext: entry("bufferFocus", { offset: 1 }),
    bprevious: entry("bufferFocus", { offset: -1 }),
    bufferlist: entry("openBufferList"),
    close: entry("bufferClose"),
    commandprompt: entry("commandPrompt"),
    compose: entry("compose"),
    edit: entry("edit"),
    exit: entry("exit"),
    flush: entry("flush"),
    prompt: entry("prompt"),
    repl: entry("repl"),
    refresh: entry("refresh"),
    search: entry("search"),
    shellescape: entry("external"),
    taglist: entry("tagList"),
  },
};
