export {
  SettingsSchema,
  GeneralSettingsSchema,
  type Settings,
  type SettingsInput,
  type GeneralSettings,
} from "./schema.js";
export { loadSettings, parseSettings, resolveSettingsPath, CONFIG_ENV_VAR } from "./loader.js";
