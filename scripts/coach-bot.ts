#!/usr/bin/env tsx
import chalk from "chalk";
import { createLineReader } from "../server/cli/lineReader";
import { startCoachBot } from "../server/cli/coachBot";
import { ConfigError, loadConfig } from "../server/config";
import {
  WikidataProvider,
  WikipediaProvider,
  configureProxy,
  describeProviderStatus,
} from "../server/services/providers";

async function main(): Promise<void> {
  try {
    const config = loadConfig();
    configureProxy(config.proxyUrl);

    const wikidata = new WikidataProvider({
      endpoint: config.wikidataEndpoint,
      userAgent: config.userAgent,
      timeoutMs: config.timeoutMs,
    });
    const wikipedia = new WikipediaProvider({
      baseUrl: config.wikipediaBaseUrl,
      userAgent: config.userAgent,
      timeoutMs: config.timeoutMs,
    });

    const exitCode = await startCoachBot({
      graph: wikidata,
      summaries: wikipedia,
      reader: createLineReader(),
      write: line => console.log(line),
      language: config.language,
      responseStyle: config.responseStyle,
    });
    if (exitCode !== 0) {
      console.error(chalk.dim(describeProviderStatus(wikidata.getMetadata())));
    }
    process.exitCode = exitCode;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(error instanceof ConfigError ? message : `Coach bot failed: ${message}`));
    process.exitCode = 1;
  }
}

void main();
