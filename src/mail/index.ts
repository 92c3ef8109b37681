export { Draft, type DraftInit, type HeaderEntry, type MailMessage } from "./draft.js";
export {
  replySubject,
  forwardSubject,
  quoteBody,
  matchOwnAddress,
  clearOwnAddresses,
  buildReferences,
  parseAddress,
  formatAddress,
  MAX_REFERENCES,
  type ParsedAddress,
} from "./reply.js";
export { renderEditableDraft, applyEditedText, EDITABLE_HEADERS } from "./envelope-file.js";
