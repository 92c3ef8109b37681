/**
 * Schemas and view helpers shared by the built-in commands.
 */

import { z } from "zod";
import type {
  TagFilter,
  Thread,
  UiContext,
  View,
  ViewFilter,
  ViewOfType,
  ViewType,
} from "../../context/types.js";
import { CommandError, DISPATCH_ERROR_CODES } from "../../errors.js";
import { Draft } from "../../mail/draft.js";

function isObject(value: unknown): boolean {
  return typeof value === "object" && value !== null;
}

function isFunction(value: unknown): boolean {
  return typeof value === "function";
}

export const threadSchema = z.custom<Thread>(isObject, "expected a thread");
export const viewSchema = z.custom<View>(isObject, "expected a view");
export const draftSchema = z.instanceof(Draft);
export const viewFilterSchema = z.custom<ViewFilter>(isFunction, "expected a filter function");
export const tagFilterSchema = z.custom<TagFilter>(isFunction, "expected a filter function");
export const continuationSchema = z.custom<() => void | Promise<void>>(isFunction, "expected a function");

export type Continuation = z.infer<typeof continuationSchema>;

/**
 * The focused view when it has the given type
 */
export function currentViewOf<T extends ViewType>(ui: UiContext, type: T): ViewOfType<T> | undefined {
  const view = ui.currentView;
  if (view && isViewOfType(view, type)) {
    return view;
  }
  return undefined;
}

/**
 * Like `currentViewOf`, but a command that cannot run elsewhere fails
 * with APPLY_FAILED
 */
export function requireView<T extends ViewType>(ui: UiContext, type: T, command: string): ViewOfType<T> {
  const view = currentViewOf(ui, type);
  if (!view) {
    throw new CommandError(DISPATCH_ERROR_CODES.APPLY_FAILED, `${command} only works in ${type} views`);
  }
  return view;
}

export function isViewOfType<T extends ViewType>(view: View, type: T): view is ViewOfType<T> {
  return view.type === type;
}

/**
 * Thread under the cursor: the selected threadline in a search view, or
 * the displayed thread in a thread view
 */
export function selectedThread(ui: UiContext): Thread | undefined {
  const view = ui.currentView;
  if (!view) return undefined;
  switch (view.type) {
    case "search":
      return view.getSelectedThread();
    case "thread":
      return view.thread;
    default:
      return undefined;
  }
}
