import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../errors.js";
import { deferred } from "./params.js";
import { CommandRegistry, CommandRegistryBuilder, createCommandRegistry, entry, type RegistryEntry } from "./registry.js";
import type { Mode } from "./types.js";
import { DEFAULT_COMMAND_TABLE } from "./table.js";

// =============================================================================
// Lookup
// =============================================================================

describe("CommandRegistry", () => {
  const registry = createCommandRegistry(DEFAULT_COMMAND_TABLE);

  it("should find mode-specific entries with their defaults", () => {
    expect(registry.get("search", "toggletag")).toEqual({ kind: "toggleTag", defaults: { tag: "inbox" } });
    expect(registry.get("thread", "groupreply")).toEqual({ kind: "reply", defaults: { groupReply: true } });
    expect(registry.get("envelope", "subject")).toEqual({ kind: "envelopeSet", defaults: { key: "Subject" } });
  });

  it("should fall back to global entries from every mode", () => {
    const global = registry.get("global", "bnext");
    expect(global).toEqual({ kind: "bufferFocus", defaults: { offset: 1 } });

    for (const mode of ["search", "thread", "envelope", "bufferlist", "taglist"] as const) {
      expect(registry.get(mode, "bnext")).toBe(global);
    }
  });

  it("should not leak mode-specific names into other modes", () => {
    expect(registry.get("thread", "toggletag")).toBeUndefined();
    expect(registry.get("global", "reply")).toBeUndefined();
    expect(registry.has("search", "send")).toBe(false);
  });

  it("should list visible names sorted", () => {
    expect(registry.names("taglist")).toEqual([
      "bnext",
      "bprevious",
      "bufferlist",
      "close",
      "commandprompt",
      "compose",
      "edit",
      "exit",
      "flush",
      "prompt",
      "refresh",
      "repl",
      "search",
      "select",
      "shellescape",
      "taglist",
    ]);
  });

  it("should freeze entries", () => {
    const found = registry.get("bufferlist", "closefocussed");
    expect(Object.isFrozen(found)).toBe(true);
    expect(Object.isFrozen(found?.defaults)).toBe(true);
  });
});

// =============================================================================
// Construction
// =============================================================================

describe("CommandRegistryBuilder", () => {
  it("should reject a duplicate name within one mode", () => {
    const builder = new CommandRegistryBuilder().add("search", "refine", entry("refine"));

    expect(() => builder.add("search", "refine", entry("refinePrompt"))).toThrow(ConfigurationError);
    expect(() => builder.add("search", "refine", entry("refine"))).toThrow("duplicate command refine in mode search");
  });

  it("should reject a mode entry that shadows a global one with another kind", () => {
    const builder = new CommandRegistryBuilder()
      .add("global", "close", entry("bufferClose"))
      .add("thread", "close", entry("exit"));

    expect(() => builder.build()).toThrow("command close in mode thread collides with the global command of that name");
  });

  it("should reject a mode entry that shadows a global one with other defaults", () => {
    const builder = new CommandRegistryBuilder()
      .add("global", "close", entry("bufferClose"))
      .add("bufferlist", "close", entry("bufferClose", { focussed: true }));

    expect(() => builder.build()).toThrow(ConfigurationError);
  });

  it("should accept a mode entry identical to the global one", () => {
    const registry = new CommandRegistryBuilder()
      .add("global", "flush", entry("flush"))
      .add("search", "flush", entry("flush"))
      .build();

    expect(registry.get("search", "flush")).toEqual({ kind: "flush", defaults: {} });
  });

  it("should compare deferred defaults by identity", () => {
    const selected = deferred(() => "inbox");
    const registry = new CommandRegistryBuilder()
      .add("global", "toggletag", entry("toggleTag", { tag: selected }))
      .add("search", "toggletag", entry("toggleTag", { tag: selected }))
      .build();
    expect(registry.get("search", "toggletag")?.defaults.tag).toBe(selected);

    const other = new CommandRegistryBuilder()
      .add("global", "toggletag", entry("toggleTag", { tag: selected }))
      .add("search", "toggletag", entry("toggleTag", { tag: deferred(() => "inbox") }));
    expect(() => other.build()).toThrow(ConfigurationError);
  });

  it("should not be affected by later builder changes", () => {
    const builder = new CommandRegistryBuilder().add("global", "exit", entry("exit"));
    const registry = builder.build();
    builder.add("global", "flush", entry("flush"));

    expect(registry.has("global", "flush")).toBe(false);
  });

  it("should not be affected by changes to the maps it was constructed from", () => {
    const global = new Map<string, RegistryEntry>([["exit", entry("exit")]]);
    const search = new Map<string, RegistryEntry>();
    const modes = new Map<Mode, Map<string, RegistryEntry>>([
      ["global", global],
      ["search", search],
    ]);
    const registry = new CommandRegistry(modes);

    global.set("flush", entry("flush"));
    search.set("exit", entry("flush"));
    modes.set("thread", new Map([["reply", entry("reply")]]));

    expect(registry.has("global", "flush")).toBe(false);
    expect(registry.get("search", "exit")?.kind).toBe("exit");
    expect(registry.has("thread", "reply")).toBe(false);
  });

  it("should check collisions when constructed directly", () => {
    const modes = new Map<Mode, Map<string, RegistryEntry>>([
      ["global", new Map([["exit", entry("exit")]])],
      ["search", new Map([["exit", entry("flush")]])],
    ]);

    expect(() => new CommandRegistry(modes)).toThrow(ConfigurationError);
  });
});
