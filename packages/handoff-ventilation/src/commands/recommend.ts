import { Command, Option } from "clipanion";
import { LOCALE_SETTINGS, describeError, resolveLocale, type LaunchLocale, type LocaleSetting } from "@handoff/core";
import { parseHumidity, parseInRange, parseTemperatureRange } from "../input.js";
import { ventilationMessages } from "../messages.js";
import { runVentilationSession } from "../session.js";
import { DEFAULT_TEMPERATURE_RANGE, HUMIDITY_RANGE, VentilationSystem, type Recommendation } from "../system.js";

function isLocaleSetting(value: string): value is LocaleSetting {
  return LOCALE_SETTINGS.some(setting => setting === value);
}

export class RecommendCommand extends Command {
  static paths = [Command.Default, ["recommend"]];

  static usage = Command.Usage({
    description: "Recommend a ventilation fan power from temperature and humidity",
    details: `
      Without \`--temperature\` and \`--humidity\` the values are asked for interactively, starting with the temperature range. Invalid answers are asked again.
    `,
    examples: [
      ["Answer the questions interactively", "$0"],
      ["Recommend for 18° and 65% on a -30..30 scale", "$0 --range='-30 30' --temperature=18 --humidity=65"],
    ],
  });

  range = Option.String("--range", { description: "Temperature range as two integers, e.g. '-30 30' (default 0 100)" });

  temperature = Option.String("--temperature", { description: "Temperature inside the range" });

  humidity = Option.String("--humidity", { description: "Relative humidity, 0 to 100" });

  locale = Option.String("--locale", { description: "Message language: auto, en or ru" });

  json = Option.Boolean("--json", false, { description: "Print the recommendation and rule activations as JSON" });

  private resolveMessagesLocale(): LaunchLocale {
    const setting = (this.locale ?? "auto").trim().toLowerCase();
    if (!isLocaleSetting(setting)) {
      throw new Error(`Unknown locale '${this.locale}'. Use ${LOCALE_SETTINGS.join(", ")}.`);
    }
    return resolveLocale(setting, this.context.env);
  }

  private recommendFromOptions(temperatureRaw: string, humidityRaw: string): Recommendation {
    const temperatureRange =
      this.range === undefined ? DEFAULT_TEMPERATURE_RANGE : parseTemperatureRange(this.range);
    if (!temperatureRange) {
      throw new Error(`Invalid temperature range '${this.range}'. Give two integers, minimum first.`);
    }
    const temperature = parseInRange(temperatureRaw, temperatureRange);
    if (temperature === null) {
      throw new Error(
        `Temperature must be an integer in [${temperatureRange.min};${temperatureRange.max}], got '${temperatureRaw}'.`
      );
    }
    const humidity = parseHumidity(humidityRaw);
    if (humidity === null) {
      throw new Error(`Humidity must be an integer in [${HUMIDITY_RANGE.min};${HUMIDITY_RANGE.max}], got '${humidityRaw}'.`);
    }
    return new VentilationSystem(temperatureRange).recommend(temperature, humidity);
  }

  async execute() {
    try {
      const locale = this.resolveMessagesLocale();

      if (this.temperature === undefined && this.humidity === undefined) {
        const { recommendation } = await runVentilationSession({
          locale,
          streams: { stdin: this.context.stdin, stdout: this.context.stdout },
        });
        if (this.json) {
          this.context.stdout.write(`${JSON.stringify(recommendation, null, 2)}\n`);
        }
        return 0;
      }

      if (this.temperature === undefined || this.humidity === undefined) {
        throw new Error("--temperature and --humidity must be given together.");
      }

      const recommendation = this.recommendFromOptions(this.temperature, this.humidity);
      if (this.json) {
        this.context.stdout.write(`${JSON.stringify(recommendation, null, 2)}\n`);
      } else {
        this.context.stdout.write(`${ventilationMessages(locale).recommendation(recommendation.fanSpeed)}\n`);
      }
      return 0;
    } catch (error) {
      if (error instanceof Error && error.name === "ExitPromptError") {
        return 130;
      }
      this.context.stderr.write(`ventilation failed: ${describeError(error)}\n`);
      return 1;
    }
  }
}
