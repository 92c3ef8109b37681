/**
 * Plain-text form of a draft handed to the user's editor: the editable
 * headers, a blank line, then the body.
 */

import type { Draft } from "./draft.js";

export const EDITABLE_HEADERS = ["Subject", "To", "From"] as const;

export function renderEditableDraft(draft: Draft): string {
  const headerText = EDITABLE_HEADERS.map((key) => `${key}: ${draft.get(key) ?? ""}`).join("\n");
  return `${headerText}\n\n${draft.body}`;
}

/**
 * Write the edited text back into the draft. Each `Key: value` line
 * replaces that header; lines without a colon are ignored.
 */
export function applyEditedText(draft: Draft, text: string): Draft {
  const normalized = text.replace(/\r\n/g, "\n");
  const separator = normalized.indexOf("\n\n");
  const headerText = separator === -1 ? normalized : normalized.slice(0, separator);
  const bodyText = separator === -1 ? "" : normalized.slice(separator + 2);

  for (const line of headerText.split("\n")) {
    const colon = line.indexOf(":");
    if (colon === -1) continue;
    const key = line.slice(0, colon).trim();
    if (!key) continue;
    draft.set(key, line.slice(colon + 1).trim());
  }

  draft.body = bodyText;
  return draft;
}
