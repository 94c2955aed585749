import type { ResponseStyle } from "@shared/schema";
import { BiographyService } from "../services/biographyService";
import { CoachQueryService } from "../services/coachQueryService";
import { CoachService } from "../services/coachService";
import type { GraphQuery, SummaryFetch } from "../services/providers";
import { ReferenceDataService } from "../services/referenceDataService";
import { formatUnavailable } from "../services/responseFormatter";
import { runInteractiveLoop, type LineReader } from "./interactiveLoop";

export const EXAMPLE_QUESTIONS = [
  'Who is coaching Berlin?',
  'Who is it for Pauli?',
  'Who is Frankfurts manager?',
  'Who is Bayerns coach?',
];

export interface CoachBotDependencies {
  graph: GraphQuery;
  summaries: SummaryFetch;
  reader: LineReader;
  write: (line: string) => void;
  language: string;
  responseStyle: ResponseStyle;
}

export function bannerLines(clubCount: number, cityCount: number): string[] {
  return [
    'Bundesliga Coach Info Bot',
    '',
    `Ask about current Bundesliga club coaches (${clubCount} clubs in ${cityCount} cities loaded).`,
    'Example questions:',
    ...EXAMPLE_QUESTIONS.map(question => ` - ${question}`),
    "Type 'exit' to quit.",
    '',
  ];
}

/**
 * Load reference data, then run the question loop. Resolves to the process
 * exit code: 1 when reference data could not be loaded, otherwise 0.
 */
export async function startCoachBot(deps: CoachBotDependencies): Promise<number> {
  const reference = await new ReferenceDataService(deps.graph, deps.language).fetchReferenceData();
  if (reference.status === 'unavailable') {
    console.error(formatUnavailable(reference.reason));
    return 1;
  }

  const { index } = reference;
  for (const line of bannerLines(index.clubs.length, index.cities.length)) {
    deps.write(line);
  }

  const service = new CoachQueryService(
    index,
    new CoachService(deps.graph, deps.language),
    new BiographyService(deps.summaries),
    { responseStyle: deps.responseStyle },
  );
  await runInteractiveLoop({ reader: deps.reader, write: deps.write }, service);
  return 0;
}
