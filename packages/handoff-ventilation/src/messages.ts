import type { LaunchLocale } from "@handoff/core";
import type { ValueRange } from "./system.js";

export interface VentilationMessages {
  title: string;
  subtitle: string;
  rangePrompt: string;
  temperaturePrompt(range: ValueRange): string;
  humidityPrompt(range: ValueRange): string;
  invalidInput: string;
  recommendation(fanSpeed: number): string;
}

const MESSAGES: Record<LaunchLocale, VentilationMessages> = {
  en: {
    title: "=== Fuzzy ventilation control system ===",
    subtitle: "=== Tsukamoto model with trapezoidal membership functions ===",
    rangePrompt: "Enter the temperature range separated by a space (example: -30 30)",
    temperaturePrompt: range => `Enter the temperature [${range.min};${range.max}]`,
    humidityPrompt: range => `Enter the humidity [${range.min};${range.max}]`,
    invalidInput: "Invalid input! Please try again..",
    recommendation: fanSpeed => `Recommended ventilation power: ${fanSpeed.toFixed(2)}%`,
  },
  ru: {
    title: "=== Система нечеткого управления вентиляцией ===",
    subtitle: "=== Модель Цукамото с трапециевидными функциями ===",
    rangePrompt: "Укажите диапазон температур через пробел (пример: -30 30)",
    temperaturePrompt: range => `Введите значение температуры [${range.min};${range.max}]`,
    humidityPrompt: range => `Введите значение влажности [${range.min};${range.max}]`,
    invalidInput: "Неверный ввод! Попробуйте еще раз..",
    recommendation: fanSpeed => `Рекомендуемая мощность вентилирования: ${fanSpeed.toFixed(2)}%`,
  },
};

export function ventilationMessages(locale: LaunchLocale): VentilationMessages {
  return MESSAGES[locale];
}
