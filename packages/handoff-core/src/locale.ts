import type { LaunchLocale } from "./types.js";

export type LocaleSetting = LaunchLocale | "auto";

export const LOCALE_SETTINGS: readonly LocaleSetting[] = ["auto", "en", "ru"];

const MESSAGES: Record<LaunchLocale, { pause: string }> = {
  en: { pause: "Press Enter to continue..." },
  ru: { pause: "Нажмите Enter для продолжения..." },
};

export function detectLocale(env: NodeJS.ProcessEnv = process.env): LaunchLocale {
  const raw = [env.LC_ALL, env.LC_MESSAGES, env.LANG].find(value => typeof value === "string" && value.trim());
  return raw && raw.trim().toLowerCase().startsWith("ru") ? "ru" : "en";
}

export function resolveLocale(setting: LocaleSetting, env: NodeJS.ProcessEnv = process.env): LaunchLocale {
  return setting === "auto" ? detectLocale(env) : setting;
}

export function pauseMessage(locale: LaunchLocale): string {
  return MESSAGES[locale].pause;
}
