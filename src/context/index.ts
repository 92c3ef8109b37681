export type {
  Account,
  AccountManager,
  Author,
  BufferlistView,
  Completer,
  EnvelopeView,
  MailSender,
  Message,
  MessageStore,
  MessageWidget,
  NotificationHandle,
  NotificationPriority,
  NotifyOptions,
  ProcessRunner,
  PromptOptions,
  Screen,
  SearchView,
  SendResult,
  TagFilter,
  TaglistView,
  Thread,
  Threadline,
  ThreadView,
  UiContext,
  View,
  ViewFilter,
  ViewOfType,
  ViewSpec,
  ViewType,
} from "./types.js";
export { NodeProcessRunner, type NodeProcessRunnerOptions } from "./process-runner.js";
