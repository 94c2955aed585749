import { z } from "zod";
import { responseStyleSchema, type ResponseStyle } from "@shared/schema";

export const DEFAULT_USER_AGENT = 'BundesligaCoachBot/1.0 (https://example.org/; contact@example.org)';

const envSchema = z.object({
  WIKIDATA_SPARQL_URL: z.string().url().default('https://query.wikidata.org/sparql'),
  WIKIPEDIA_BASE_URL: z.string().min(1).default('https://{lang}.wikipedia.org'),
  COACH_BOT_LANGUAGE: z.string().regex(/^[a-z]{2,3}$/, 'Expected a two or three letter language code').default('en'),
  COACH_BOT_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  COACH_BOT_RESPONSE_STYLE: responseStyleSchema.default('prompt'),
  COACH_BOT_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  HTTPS_PROXY: z.string().url().optional(),
  HTTP_PROXY: z.string().url().optional(),
});

export interface CoachBotConfig {
  wikidataEndpoint: string;
  wikipediaBaseUrl: string;
  language: string;
  timeoutMs: number;
  responseStyle: ResponseStyle;
  userAgent: string;
  proxyUrl?: string;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Read settings from the environment. Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CoachBotConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  const values = parsed.data;
  return {
    wikidataEndpoint: values.WIKIDATA_SPARQL_URL,
    wikipediaBaseUrl: values.WIKIPEDIA_BASE_URL.replace('{lang}', values.COACH_BOT_LANGUAGE),
    language: values.COACH_BOT_LANGUAGE,
    timeoutMs: values.COACH_BOT_TIMEOUT_MS,
    responseStyle: values.COACH_BOT_RESPONSE_STYLE,
    userAgent: values.COACH_BOT_USER_AGENT,
    proxyUrl: values.HTTPS_PROXY ?? values.HTTP_PROXY,
  };
}
