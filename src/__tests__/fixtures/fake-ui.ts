/**
 * In-process stand-ins for the terminal UI, message store, accounts and
 * process runner
 */

import { vi } from "vitest";
import type { Command } from "../../commands/command.js";
import type { CommandDispatcher } from "../../commands/dispatcher.js";
import { isViewOfType } from "../../commands/builtin/support.js";
import { parseSettings } from "../../config/loader.js";
import type { Settings, SettingsInput } from "../../config/schema.js";
import type {
  Account,
  AccountManager,
  Author,
  BufferlistView,
  Completer,
  EnvelopeView,
  Message,
  MessageStore,
  MessageWidget,
  NotificationHandle,
  NotifyOptions,
  ProcessRunner,
  PromptOptions,
  SearchView,
  SendResult,
  TaglistView,
  Thread,
  Threadline,
  ThreadView,
  UiContext,
  View,
  ViewOfType,
  ViewSpec,
  ViewType,
} from "../../context/types.js";
import { ReadOnlyStoreError, StoreLockedError } from "../../errors.js";
import { BaseLogReporter, type LogEntry, type LogLevel } from "../../logging/log-reporter.js";
import { Draft } from "../../mail/draft.js";

// =============================================================================
// Logging
// =============================================================================

export class MemoryLogReporter extends BaseLogReporter {
  entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => !level || entry.level === level).map((entry) => entry.message);
  }
}

// =============================================================================
// Store
// =============================================================================

export class FakeThread implements Thread {
  readOnly = false;

  constructor(
    readonly id: string,
    public tags: string[] = [],
    readonly totalMessages = 1
  ) {}

  getThreadId(): string {
    return this.id;
  }

  getTags(): string[] {
    return [...this.tags];
  }

  addTags(tags: string[]): void {
    this.guard();
    for (const tag of tags) {
      if (!this.tags.includes(tag)) this.tags.push(tag);
    }
  }

  removeTags(tags: string[]): void {
    this.guard();
    this.tags = this.tags.filter((tag) => !tags.includes(tag));
  }

  setTags(tags: string[]): void {
    this.guard();
    this.tags = [...tags];
  }

  getTotalMessages(): number {
    return this.totalMessages;
  }

  private guard(): void {
    if (this.readOnly) throw new ReadOnlyStoreError();
  }
}

export class FakeStore implements MessageStore {
  /** Number of upcoming flushes that fail with StoreLockedError */
  lockedFlushes = 0;
  /** Thrown by every flush when set */
  failure: Error | undefined;
  attempts = 0;
  flushes = 0;
  tags: string[] = [];
  counts = new Map<string, number>();
  defaultCount = 1;
  queries: string[] = [];

  flush(): void {
    this.attempts++;
    if (this.failure) throw this.failure;
    if (this.lockedFlushes > 0) {
      this.lockedFlushes--;
      throw new StoreLockedError();
    }
    this.flushes++;
  }

  countMessages(query: string): number {
    this.queries.push(query);
    return this.counts.get(query) ?? this.defaultCount;
  }

  getAllTags(): string[] {
    return [...this.tags];
  }
}

export interface FakeMessageInit {
  id: string;
  date?: string;
  author?: Author;
  body?: string;
  mail?: Draft;
  tags?: string[];
}

export class FakeMessage implements Message {
  tags: string[];

  constructor(private init: FakeMessageInit) {
    this.tags = [...(init.tags ?? [])];
  }

  getMessageId(): string {
    return this.init.id;
  }

  getDateString(): string {
    return this.init.date ?? "today";
  }

  getAuthor(): Author {
    return this.init.author ?? { name: "Sender", address: "sender@example.com" };
  }

  getBody(): string {
    return this.init.body ?? "";
  }

  getMail(): Draft {
    return this.init.mail ?? new Draft();
  }

  getTags(): string[] {
    return [...this.tags];
  }

  removeTags(tags: string[]): void {
    this.tags = this.tags.filter((tag) => !tags.includes(tag));
  }
}

// =============================================================================
// Views
// =============================================================================

abstract class FakeView {
  rebuilds = 0;

  rebuild(): void {
    this.rebuilds++;
  }
}

export class FakeThreadline implements Threadline {
  rebuilds = 0;

  constructor(readonly thread: Thread) {}

  rebuild(): void {
    this.rebuilds++;
  }
}

export class FakeSearchView extends FakeView implements SearchView {
  readonly type = "search" as const;
  resultCount: number;
  threadlines: FakeThreadline[];
  selectedIndex = 0;

  constructor(
    public querystring: string,
    threads: Thread[] = []
  ) {
    super();
    this.threadlines = threads.map((thread) => new FakeThreadline(thread));
    this.resultCount = threads.reduce((sum, thread) => sum + thread.getTotalMessages(), 0);
  }

  getSelectedThreadline(): FakeThreadline | undefined {
    return this.threadlines.at(this.selectedIndex);
  }

  getSelectedThread(): Thread | undefined {
    return this.getSelectedThreadline()?.thread;
  }

  removeThreadline(line: Threadline): void {
    this.threadlines = this.threadlines.filter((candidate) => candidate !== line);
  }
}

export class FakeMessageWidget implements MessageWidget {
  rebuilds = 0;
  visible: boolean | undefined;

  constructor(readonly message: Message) {}

  getMessage(): Message {
    return this.message;
  }

  rebuild(): void {
    this.rebuilds++;
  }

  fold(visible: boolean): void {
    this.visible = visible;
  }
}

export class FakeThreadView extends FakeView implements ThreadView {
  readonly type = "thread" as const;
  widgets: FakeMessageWidget[];
  selectedIndex = 0;

  constructor(
    readonly thread: Thread,
    messages: Message[] = []
  ) {
    super();
    this.widgets = messages.map((message) => new FakeMessageWidget(message));
  }

  getSelection(): FakeMessageWidget | undefined {
    return this.widgets.at(this.selectedIndex);
  }

  getSelectedMessage(): Message | undefined {
    return this.getSelection()?.getMessage();
  }

  getMessageWidgets(): FakeMessageWidget[] {
    return [...this.widgets];
  }
}

export class FakeEnvelopeView extends FakeView implements EnvelopeView {
  readonly type = "envelope" as const;

  constructor(public draft: Draft = new Draft()) {
    super();
  }

  getDraft(): Draft {
    return this.draft;
  }

  setDraft(draft: Draft): void {
    this.draft = draft;
  }
}

export class FakeBufferlistView extends FakeView implements BufferlistView {
  readonly type = "bufferlist" as const;
  selected: View | undefined;

  getSelectedView(): View | undefined {
    return this.selected;
  }
}

export class FakeTaglistView extends FakeView implements TaglistView {
  readonly type = "taglist" as const;
  selectedIndex = 0;

  constructor(readonly tags: string[] = []) {
    super();
  }

  getSelectedTag(): string | undefined {
    return this.tags.at(this.selectedIndex);
  }
}

function createView(spec: ViewSpec): View {
  switch (spec.type) {
    case "search":
      return new FakeSearchView(spec.query);
    case "thread":
      return new FakeThreadView(spec.thread);
    case "envelope":
      return new FakeEnvelopeView(spec.draft);
    case "bufferlist":
      return new FakeBufferlistView();
    case "taglist":
      return new FakeTaglistView(spec.tags);
  }
}

// =============================================================================
// Accounts & processes
// =============================================================================

export function createAccount(realname: string, address: string, result: SendResult = { success: true }): Account {
  return {
    realname,
    address,
    sender: { sendMail: vi.fn(async (_draft: Draft): Promise<SendResult> => result) },
  };
}

export class FakeAccountManager implements AccountManager {
  constructor(public accounts: Account[] = []) {}

  getAccounts(): Account[] {
    return [...this.accounts];
  }

  getAccountByAddress(address: string): Account | undefined {
    return this.accounts.find((account) => account.address === address);
  }

  getAccountAddresses(): string[] {
    return this.accounts.map((account) => account.address);
  }
}

export class FakeProcessRunner implements ProcessRunner {
  commands: string[] = [];
  exitCode = 0;
  /** Runs before the exit code is returned, e.g. to play the user's editor */
  onRun: ((command: string) => void) | undefined;

  runBlocking(command: string): number {
    this.commands.push(command);
    this.onRun?.(command);
    return this.exitCode;
  }

  async runInBackground(command: string): Promise<number> {
    return this.runBlocking(command);
  }
}

// =============================================================================
// UI
// =============================================================================

export interface Notification {
  message: string;
  options: NotifyOptions | undefined;
  handle: NotificationHandle;
}

export interface FakeUiOptions {
  settings?: SettingsInput;
  accounts?: Account[];
}

export class FakeUi implements UiContext {
  views: View[] = [];
  currentView: View | undefined;

  readonly store = new FakeStore();
  readonly accounts: FakeAccountManager;
  readonly processes = new FakeProcessRunner();
  readonly screen = { stop: vi.fn(), start: vi.fn() };
  readonly settings: Settings;
  readonly logger = new MemoryLogReporter();
  contacts: Completer | undefined;

  notifications: Notification[] = [];
  cleared: NotificationHandle[] = [];
  prompts: PromptOptions[] = [];
  /** Answers handed out by `prompt`, in order; null cancels */
  promptAnswers: Array<string | null> = [];
  commandPrompts: string[] = [];
  alarms: number[] = [];
  focused: View[] = [];
  applied: Command[] = [];
  updates = 0;
  shutdowns = 0;
  repls = 0;
  /** Nested commands go through this dispatcher when set */
  dispatcher: CommandDispatcher | undefined;

  constructor(options: FakeUiOptions = {}) {
    this.settings = parseSettings(options.settings ?? {});
    this.accounts = new FakeAccountManager(options.accounts);
  }

  /** Add an existing view and focus it */
  show<T extends View>(view: T): T {
    this.views.push(view);
    this.currentView = view;
    return view;
  }

  open(spec: ViewSpec): View {
    return this.show(createView(spec));
  }

  focus(view: View): void {
    this.focused.push(view);
    this.currentView = view;
  }

  close(view: View): void {
    this.views = this.views.filter((candidate) => candidate !== view);
    if (this.currentView === view) {
      this.currentView = this.views.at(-1);
    }
  }

  viewsOfType<T extends ViewType>(type: T): ViewOfType<T>[] {
    return this.views.filter((view): view is ViewOfType<T> => isViewOfType(view, type));
  }

  notify(message: string, options?: NotifyOptions): NotificationHandle {
    const handle = { id: `n${this.notifications.length + 1}` };
    this.notifications.push({ message, options, handle });
    return handle;
  }

  notified(): string[] {
    return this.notifications.map((notification) => notification.message);
  }

  clearNotify(handles: NotificationHandle[]): void {
    this.cleared.push(...handles);
  }

  async prompt(options: PromptOptions): Promise<string | null> {
    this.prompts.push(options);
    return this.promptAnswers.shift() ?? null;
  }

  async commandPrompt(startString: string): Promise<void> {
    this.commandPrompts.push(startString);
  }

  setAlarm(seconds: number, callback: () => void): void {
    this.alarms.push(seconds);
    setTimeout(callback, seconds * 1000);
  }

  update(): void {
    this.updates++;
  }

  shutdown(): void {
    this.shutdowns++;
  }

  async repl(): Promise<void> {
    this.repls++;
  }

  async applyCommand(command: Command): Promise<void> {
    this.applied.push(command);
    if (this.dispatcher) {
      await this.dispatcher.apply(command, this);
    } else {
      await command.apply(this);
    }
  }
}

/**
 * Narrow `value` to an instance of `type`, failing the test otherwise
 */
export function expectInstance<T>(value: unknown, type: abstract new (...args: never[]) => T): T {
  if (!(value instanceof type)) {
    throw new Error(`expected an instance of ${type.name}, got ${String(value)}`);
  }
  return value;
}
