import { describe, it, expect } from "vitest";
import { FakeSearchView, FakeUi } from "../../__tests__/fixtures/fake-ui.js";
import { CommandPromptCommand, ExitCommand, PromptCommand, RefreshCommand, ReplCommand } from "./app.js";

describe("application commands", () => {
  it("should shut down", async () => {
    const ui = new FakeUi();

    await new ExitCommand().apply(ui);

    expect(ui.shutdowns).toBe(1);
  });

  it("should open the command prompt with and without a start string", async () => {
    const ui = new FakeUi();

    await new PromptCommand({ startString: "search " }).apply(ui);
    await new PromptCommand().apply(ui);
    await new CommandPromptCommand().apply(ui);

    expect(ui.commandPrompts).toEqual(["search ", "", ""]);
  });

  it("should rebuild the current buffer", async () => {
    const ui = new FakeUi();
    const view = ui.show(new FakeSearchView("tag:inbox"));

    await new RefreshCommand().apply(ui);

    expect(view.rebuilds).toBe(1);
    expect(ui.updates).toBe(1);
  });

  it("should suspend the screen around the repl", async () => {
    const ui = new FakeUi();

    await new ReplCommand().apply(ui);

    expect(ui.repls).toBe(1);
    expect(ui.screen.stop).toHaveBeenCalledTimes(1);
    expect(ui.screen.start).toHaveBeenCalledTimes(1);
  });

  it("should describe themselves", () => {
    expect(new ExitCommand().help).toBe("shut the MUA down cleanly");
    expect(new ExitCommand().undoable).toBe(false);
  });
});
