/**
 * End-to-end dispatch through createDispatcher: command lines and
 * keybinding calls against the in-process UI, with nested commands routed
 * back through the dispatcher.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  FakeEnvelopeView,
  FakeSearchView,
  FakeThread,
  FakeUi,
  MemoryLogReporter,
  createAccount,
  expectInstance,
} from "../fixtures/fake-ui.js";
import { SearchCommand } from "../../commands/builtin/search.js";
import { ExternalCommand } from "../../commands/builtin/external.js";
import { RetagCommand } from "../../commands/builtin/store.js";
import type { CommandDispatcher } from "../../commands/dispatcher.js";
import { createCommandRegistry } from "../../commands/registry.js";
import { DEFAULT_COMMAND_TABLE } from "../../commands/table.js";
import { MODES } from "../../commands/types.js";
import type { SettingsInput } from "../../config/schema.js";
import { parseSettings } from "../../config/loader.js";
import { UnknownCommandError } from "../../errors.js";
import { createDispatcher } from "../../index.js";

const SETTINGS: SettingsInput = {
  general: { editorCmd: "vi", flushRetryTimeout: 2, askSubject: false },
  commandAliases: { q: "exit", inbox: "search tag:inbox", x: "q" },
};

/** Parameters a command cannot be built without */
const REQUIRED_PARAMS: Record<string, Record<string, unknown>> = {
  search: { query: "*" },
  shellescape: { commandString: "true" },
  edit: { path: "/tmp/notes.txt" },
};

describe("dispatch integration", () => {
  let logger: MemoryLogReporter;
  let dispatcher: CommandDispatcher;
  let ui: FakeUi;

  beforeEach(async () => {
    logger = new MemoryLogReporter();
    dispatcher = await createDispatcher({ settings: parseSettings(SETTINGS), logger });
    ui = new FakeUi({ settings: SETTINGS, accounts: [createAccount("Me", "me@example.com")] });
    ui.dispatcher = dispatcher;
  });

  // ===========================================================================
  // Resolution
  // ===========================================================================

  describe("Resolution", () => {
    it("should resolve every visible command with its registered defaults", () => {
      const registry = createCommandRegistry(DEFAULT_COMMAND_TABLE);

      for (const mode of MODES) {
        for (const [name, registered] of registry.entries(mode)) {
          const result = dispatcher.resolve(name, mode, REQUIRED_PARAMS[name]);
          if (!result.success) throw result.error;

          expect(result.command.name).toBe(name);
          expect(result.command.params).toMatchObject(registered.defaults);
        }
      }
    });

    it("should resolve global names the same way from every mode", () => {
      const expected = dispatcher.resolve("search", "global", { query: "tag:todo" });
      if (!expected.success) throw expected.error;

      for (const mode of MODES) {
        const result = dispatcher.resolve("search", mode, { query: "tag:todo" });
        if (!result.success) throw result.error;
        expect(result.command).toBeInstanceOf(SearchCommand);
        expect(result.command.params).toEqual(expected.command.params);
      }
    });

    it("should report unknown names", () => {
      const result = dispatcher.resolve("nonexistent", "global");

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(UnknownCommandError);
    });

    it("should let call-site parameters override defaults", () => {
      const result = dispatcher.resolve("toggletag", "search", { tag: "urgent" });
      if (!result.success) throw result.error;

      expect(result.command.params).toMatchObject({ tag: "urgent" });
    });
  });

  // ===========================================================================
  // Command lines
  // ===========================================================================

  describe("Command lines", () => {
    it("should interpret the documented lines", () => {
      for (const mode of MODES) {
        expect(dispatcher.interpret("", mode)).toBeNull();
      }
      expect(expectInstance(dispatcher.interpret("search tag:inbox", "global"), SearchCommand).params.query).toBe(
        "tag:inbox"
      );
      expect(expectInstance(dispatcher.interpret("!ls -la", "global"), ExternalCommand).params.commandString).toBe(
        "ls -la"
      );
      expect(expectInstance(dispatcher.interpret("retag foo,bar", "search"), RetagCommand).params.tagsString).toBe(
        "foo,bar"
      );
      expect(dispatcher.interpret("exit extra-garbage", "global")).toBeNull();
      expect(dispatcher.interpret("bogus", "thread")).toBeNull();
    });

    it("should open a search buffer from the prompt and through an alias", async () => {
      await dispatcher.dispatch("search tag:todo", "global", ui);
      await dispatcher.dispatch("inbox", "search", ui);

      expect(ui.viewsOfType("search").map((view) => view.querystring)).toEqual(["tag:todo", "tag:inbox"]);
    });

    it("should expand aliases exactly once", async () => {
      await expect(dispatcher.dispatch("x", "global", ui)).resolves.toBeNull();
      await dispatcher.dispatch("Q", "global", ui);

      expect(ui.shutdowns).toBe(1);
    });

    it("should log the configuration that was loaded", () => {
      expect(logger.messages("debug")).toContain("loaded 0 hooks and 3 aliases");
    });
  });

  // ===========================================================================
  // Nested commands
  // ===========================================================================

  describe("Nested commands", () => {
    let thread: FakeThread;
    let view: FakeSearchView;

    beforeEach(() => {
      thread = new FakeThread("t1", ["inbox"]);
      view = ui.show(new FakeSearchView("tag:inbox", [thread]));
    });

    it("should apply the flush issued by toggletag through the dispatcher", async () => {
      const outcome = await dispatcher.dispatch("toggletag todo", "search", ui);

      expect(outcome?.success).toBe(true);
      expect(thread.tags).toEqual(["inbox", "todo"]);
      expect(logger.messages("debug").filter((message) => message.startsWith("appl"))).toEqual([
        "applying toggletag",
        "applying flush",
        "applied flush",
        "applied toggletag",
      ]);
    });

    it("should contain a failing nested command and finish the outer one", async () => {
      ui.store.failure = new Error("disk full");

      const outcome = await dispatcher.execute("toggletag", "search", ui, { tag: "todo" });

      expect(outcome.success).toBe(true);
      expect(ui.notifications).toEqual([
        { message: "disk full", options: { priority: "error" }, handle: { id: "n1" } },
      ]);
      expect(logger.messages("error")).toEqual(["disk full"]);
      expect(view.threadlines[0].rebuilds).toBe(1);
    });
  });

  // ===========================================================================
  // Flush retry
  // ===========================================================================

  describe("Flush retry", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("should retry a locked index until the third attempt succeeds", async () => {
      ui.store.lockedFlushes = 2;

      const outcome = await dispatcher.dispatch("flush", "global", ui);
      expect(outcome?.success).toBe(true);

      vi.advanceTimersByTime(2000);
      vi.advanceTimersByTime(2000);

      expect(ui.store.attempts).toBe(3);
      expect(ui.store.flushes).toBe(1);
      expect(ui.notified()).toEqual([
        "index locked, will try again in 2 secs",
        "index locked, will try again in 2 secs",
      ]);
      expect(logger.messages("error")).toEqual([]);
    });
  });

  // ===========================================================================
  // Compose and send
  // ===========================================================================

  describe("Compose and send", () => {
    const paths: string[] = [];

    afterEach(() => {
      for (const path of paths.splice(0)) {
        rmSync(path, { recursive: true, force: true });
      }
    });

    it("should compose, edit and send a message", async () => {
      ui.processes.onRun = (command) => {
        const path = command.slice("vi ".length);
        paths.push(path);
        writeFileSync(path, "Subject: Plans\nTo: bob@example.com\nFrom: Me <me@example.com>\n\nsee you\n");
      };

      await dispatcher.dispatch("compose bob@example.com", "global", ui);

      const envelope = expectInstance(ui.currentView, FakeEnvelopeView);
      expect(envelope.draft.entries()).toEqual([
        ["Subject", "Plans"],
        ["To", "bob@example.com"],
        ["From", "Me <me@example.com>"],
      ]);
      expect(envelope.draft.body).toBe("see you\n");

      const outcome = await dispatcher.dispatch("send", "envelope", ui);

      expect(outcome?.success).toBe(true);
      expect(ui.views).toEqual([]);
      expect(ui.notified()).toEqual(["sending..", "mail send successful"]);
    });
  });

  // ===========================================================================
  // Hooks file
  // ===========================================================================

  describe("Hooks file", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "mua-dispatch-hooks-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("should load hooks named in the settings", async () => {
      const hooksFile = join(dir, "hooks.mjs");
      writeFileSync(hooksFile, 'export const pre_exit = () => ({ proceed: false, reason: "drafts open" });\n');

      const configured = await createDispatcher({ settings: parseSettings({ hooksFile }), logger });
      await configured.dispatch("exit", "global", ui);

      expect(ui.shutdowns).toBe(0);
      expect(ui.notified()).toEqual(["prehook blocked exit: drafts open"]);
    });
  });
});
