import { DailyRecord } from "../interfaces/pastWeather";
import {
  DailySchema,
  PastWeatherEnvelopeSchema,
  ProviderErrorBodySchema,
} from "../schemas/pastWeather.schema";
import {
  MalformedResponseError,
  ProviderError,
  SchemaMismatchError,
  describeIssues,
} from "../errors";

/**
 * Returns the provider's error message when the body is an error envelope
 * (`{ data: { error: [{ msg }] } }`), otherwise null.
 */
export function providerErrorMessage(body: unknown): string | null {
  const parsed = ProviderErrorBodySchema.safeParse(body);
  if (!parsed.success) return null;
  return parsed.data.data.error.map((e) => e.msg).join("; ");
}

/**
 * Decodes one past-weather response into validated daily records.
 */
export function parsePastWeather(body: unknown): DailyRecord[] {
  const providerMessage = providerErrorMessage(body);
  if (providerMessage !== null) {
    throw new ProviderError(providerMessage);
  }

  const envelope = PastWeatherEnvelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw new MalformedResponseError(
      `Past weather response is missing data.weather: ${describeIssues(envelope.error.issues)}`
    );
  }

  return envelope.data.data.weather.map((raw, index) => {
    const day = DailySchema.safeParse(raw);

    if (!day.success) {
      throw new SchemaMismatchError(
        `Daily record ${index} does not match the expected schema: ${describeIssues(day.error.issues)}`,
        day.error.issues
      );
    }

    return day.data;
  });
}
