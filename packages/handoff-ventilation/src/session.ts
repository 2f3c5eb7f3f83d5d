import { input as inquirerInput } from "@inquirer/prompts";
import { watchInputEnd, type LaunchLocale, type LaunchStreams } from "@handoff/core";
import { parseHumidity, parseInRange, parseTemperatureRange } from "./input.js";
import { ventilationMessages } from "./messages.js";
import { HUMIDITY_RANGE, VentilationSystem, type Recommendation, type ValueRange } from "./system.js";

/** Asks for one line; `validate` returns true or the error to show before asking again. */
export type ValuePrompt = (
  message: string,
  validate: (value: string) => true | string,
  streams: LaunchStreams
) => Promise<string>;

export class InputEndedError extends Error {
  constructor() {
    super("Input ended before a value was entered");
    this.name = "InputEndedError";
  }
}

const inquirerValuePrompt: ValuePrompt = async (message, validate, streams) => {
  const inputEnd = watchInputEnd(streams.stdin);
  if (inputEnd.signal.aborted) {
    throw new InputEndedError();
  }
  try {
    return await inquirerInput(
      { message, validate },
      { input: streams.stdin, output: streams.stdout, signal: inputEnd.signal }
    );
  } catch (error) {
    if (inputEnd.signal.aborted) {
      throw new InputEndedError();
    }
    throw error;
  } finally {
    inputEnd.dispose();
  }
};

let valuePrompt: ValuePrompt = inquirerValuePrompt;

export function __setValuePrompt(fn: ValuePrompt) {
  valuePrompt = fn;
}

export function __resetValuePrompt() {
  valuePrompt = inquirerValuePrompt;
}

export interface SessionOptions {
  locale: LaunchLocale;
  streams: LaunchStreams;
}

export interface SessionResult {
  temperatureRange: ValueRange;
  recommendation: Recommendation;
}

async function askUntilValid<T>(
  message: string,
  parse: (raw: string) => T | null,
  invalid: string,
  streams: LaunchStreams
): Promise<T> {
  for (;;) {
    const raw = await valuePrompt(message, value => (parse(value) === null ? invalid : true), streams);
    const parsed = parse(raw);
    if (parsed !== null) {
      return parsed;
    }
    streams.stdout.write(`${invalid}\n`);
  }
}

/**
 * Interactive run: asks for the temperature range, then a temperature and a
 * humidity inside their ranges, and prints the recommended fan power.
 */
export async function runVentilationSession(options: SessionOptions): Promise<SessionResult> {
  const { streams } = options;
  const text = ventilationMessages(options.locale);

  streams.stdout.write(`${text.title}\n${text.subtitle}\n\n`);

  const temperatureRange = await askUntilValid(text.rangePrompt, parseTemperatureRange, text.invalidInput, streams);
  const system = new VentilationSystem(temperatureRange);
  const temperature = await askUntilValid(
    text.temperaturePrompt(temperatureRange),
    raw => parseInRange(raw, temperatureRange),
    text.invalidInput,
    streams
  );
  const humidity = await askUntilValid(text.humidityPrompt(HUMIDITY_RANGE), parseHumidity, text.invalidInput, streams);

  const recommendation = system.recommend(temperature, humidity);
  streams.stdout.write(`\n${text.recommendation(recommendation.fanSpeed)}\n\n`);
  return { temperatureRange, recommendation };
}
