/**
 * Header computations for replies and forwards.
 */

import type { MailMessage } from "./draft.js";

/** Maximum number of trailing ids kept from an existing References header */
export const MAX_REFERENCES = 8;

export function replySubject(subject: string | undefined): string {
  const value = subject ?? "";
  return value.startsWith("Re:") ? value : `Re: ${value}`;
}

export function forwardSubject(subject: string | undefined): string {
  return `Fwd: ${subject ?? ""}`;
}

/**
 * Intro line followed by every body line prefixed with `>`
 */
export function quoteBody(intro: string, body: string): string {
  let quoted = intro;
  for (const line of splitLines(body)) {
    quoted += `>${line}\n`;
  }
  return quoted;
}

function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * First own address found in To, then in Cc and Bcc
 */
export function matchOwnAddress(ownAddresses: string[], mail: MailMessage): string | undefined {
  const to = mail.get("To") ?? "";
  const inTo = ownAddresses.find((address) => to.includes(address));
  if (inTo) {
    return inTo;
  }
  const copies = (mail.get("Cc") ?? "") + (mail.get("Bcc") ?? "");
  return ownAddresses.find((address) => copies.includes(address));
}

/**
 * Drop the recipients of a comma-separated list that mention an own address
 */
export function clearOwnAddresses(ownAddresses: string[], value: string): string {
  return value
    .split(",")
    .filter((entry) => !ownAddresses.some((address) => entry.includes(address)))
    .map((entry) => entry.trim())
    .join(", ");
}

export function buildReferences(oldReferences: string | undefined, messageId: string): string {
  const own = `<${messageId}>`;
  const old = oldReferences?.split(/\s+/).filter(Boolean) ?? [];
  if (old.length === 0) {
    return own;
  }
  let references = old.slice(-MAX_REFERENCES);
  if (old.length > MAX_REFERENCES) {
    references = [old[0], ...references];
  }
  return [...references, own].join(" ");
}

export interface ParsedAddress {
  name: string;
  address: string;
}

/**
 * Split `Name <user@host>` (or a bare address) into its parts
 */
export function parseAddress(value: string): ParsedAddress {
  const match = value.match(/^\s*(.*?)\s*<([^>]*)>\s*$/);
  if (!match) {
    return { name: "", address: value.trim() };
  }
  const [, name, address] = match;
  return { name: name.replace(/^"(.*)"$/, "$1"), address: address.trim() };
}

export function formatAddress(name: string, address: string): string {
  return name ? `${name} <${address}>` : address;
}
