/**
 * Hooks
 *
 * Per-command pre/post hooks.
 *
 * @example
 * ```typescript
 * import { CommandHookTable, loadHookModule } from 'mua-dispatch/hooks';
 *
 * const hooks = await loadHookModule(settings.hooksFile);
 * hooks.register('post', 'send', ({ ui }) => ui.notify('sent'));
 * ```
 */

export type {
  CommandHook,
  HookBindings,
  HookContext,
  HookPhase,
  HookResult,
} from "./types.js";
export { HOOK_PHASES } from "./types.js";
export { CommandHookTable, hookKey, parseHookKey } from "./table.js";
export { loadHookModule } from "./loader.js";
