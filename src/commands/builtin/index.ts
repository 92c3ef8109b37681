export * from "./app.js";
export * from "./compose.js";
export * from "./envelope.js";
export * from "./external.js";
export * from "./search.js";
export * from "./store.js";
export * from "./thread.js";
export * from "./views.js";
export { currentViewOf, isViewOfType, requireView, selectedThread, type Continuation } from "./support.js";
