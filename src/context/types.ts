/**
 * UI Context Types
 *
 * The narrow surface through which commands reach the terminal UI, the
 * message store, accounts and external processes. The application
 * implements these; the command layer only consumes them.
 */

import type { Command } from "../commands/command.js";
import type { Settings } from "../config/schema.js";
import type { LogReporter } from "../logging/log-reporter.js";
import type { Draft, MailMessage } from "../mail/draft.js";

// ============================================================================
// MESSAGE STORE
// ============================================================================

/**
 * Tag mutations throw ReadOnlyStoreError when the index is read-only.
 */
export interface Thread {
  getThreadId(): string;
  getTags(): string[];
  addTags(tags: string[]): void;
  removeTags(tags: string[]): void;
  setTags(tags: string[]): void;
  getTotalMessages(): number;
}

export interface Author {
  name: string;
  address: string;
}

export interface Message {
  getMessageId(): string;
  getDateString(): string;
  getAuthor(): Author;
  /** Decoded text of all text parts */
  getBody(): string;
  getMail(): MailMessage;
  getTags(): string[];
  removeTags(tags: string[]): void;
}

export interface MessageStore {
  /** Throws StoreLockedError while another writer holds the index */
  flush(): void;
  countMessages(query: string): number;
  getAllTags(): string[];
}

// ============================================================================
// VIEWS
// ============================================================================

export type ViewType = "search" | "thread" | "envelope" | "bufferlist" | "taglist";

interface ViewBase {
  readonly type: ViewType;
  rebuild(): void;
}

export interface Threadline {
  readonly thread: Thread;
  rebuild(): void;
}

export interface SearchView extends ViewBase {
  readonly type: "search";
  querystring: string;
  resultCount: number;
  getSelectedThread(): Thread | undefined;
  getSelectedThreadline(): Threadline | undefined;
  removeThreadline(line: Threadline): void;
}

export interface MessageWidget {
  getMessage(): Message;
  rebuild(): void;
  fold(visible: boolean): void;
}

export interface ThreadView extends ViewBase {
  readonly type: "thread";
  readonly thread: Thread;
  getSelectedMessage(): Message | undefined;
  getSelection(): MessageWidget | undefined;
  getMessageWidgets(): MessageWidget[];
}

export interface EnvelopeView extends ViewBase {
  readonly type: "envelope";
  getDraft(): Draft;
  setDraft(draft: Draft): void;
}

export interface BufferlistView extends ViewBase {
  readonly type: "bufferlist";
  getSelectedView(): View | undefined;
}

export interface TaglistView extends ViewBase {
  readonly type: "taglist";
  getSelectedTag(): string | undefined;
}

export type View = SearchView | ThreadView | EnvelopeView | BufferlistView | TaglistView;

export type ViewOfType<T extends ViewType> = Extract<View, { type: T }>;

export type ViewFilter = (view: View) => boolean;
export type TagFilter = (tag: string) => boolean;

/**
 * What to open; the UI builds the widget
 */
export type ViewSpec =
  | { type: "search"; query: string }
  | { type: "thread"; thread: Thread }
  | { type: "envelope"; draft?: Draft }
  | { type: "bufferlist"; filter?: ViewFilter }
  | { type: "taglist"; tags: string[]; filter?: TagFilter };

// ============================================================================
// ACCOUNTS
// ============================================================================

export interface SendResult {
  success: boolean;
  reason?: string;
}

export interface MailSender {
  sendMail(draft: Draft): Promise<SendResult>;
}

export interface Account {
  realname: string;
  address: string;
  sender: MailSender;
}

export interface AccountManager {
  getAccounts(): Account[];
  getAccountByAddress(address: string): Account | undefined;
  getAccountAddresses(): string[];
}

// ============================================================================
// PROMPTS & NOTIFICATIONS
// ============================================================================

export interface Completer {
  complete(original: string): string[];
}

export interface PromptOptions {
  prefix: string;
  text?: string;
  completer?: Completer;
  /** Number of tab presses to simulate on open */
  tab?: number;
}

export type NotificationPriority = "normal" | "error";

export interface NotifyOptions {
  priority?: NotificationPriority;
  /** Seconds; -1 keeps the message until cleared */
  timeout?: number;
  block?: boolean;
}

export type NotificationHandle = { readonly id: string };

// ============================================================================
// PROCESSES
// ============================================================================

export interface ProcessRunner {
  /** Run to completion, blocking the event loop; returns the exit code */
  runBlocking(command: string): number;
  /** Run without blocking; resolves with the exit code */
  runInBackground(command: string): Promise<number>;
}

export interface Screen {
  stop(): void;
  start(): void;
}

// ============================================================================
// UI CONTEXT
// ============================================================================

export interface UiContext {
  readonly views: readonly View[];
  readonly currentView: View | undefined;
  open(spec: ViewSpec): View;
  focus(view: View): void;
  close(view: View): void;
  viewsOfType<T extends ViewType>(type: T): ViewOfType<T>[];

  readonly store: MessageStore;
  readonly accounts: AccountManager;
  readonly processes: ProcessRunner;
  readonly screen: Screen;
  readonly settings: Settings;
  readonly logger: LogReporter;
  /** Address completion for To prompts, when the UI has an address book */
  readonly contacts?: Completer;

  notify(message: string, options?: NotifyOptions): NotificationHandle;
  clearNotify(handles: NotificationHandle[]): void;
  /** Resolves with the entered text, or null when cancelled */
  prompt(options: PromptOptions): Promise<string | null>;
  /** Open the colon prompt prefilled with `startString` */
  commandPrompt(startString: string): Promise<void>;
  setAlarm(seconds: number, callback: () => void): void;
  update(): void;
  shutdown(): void;
  /** Interactive introspection shell; resolves when it exits */
  repl(): Promise<void>;

  /** Routes nested commands through the dispatcher's error boundary and log */
  applyCommand(command: Command): Promise<void>;
}
