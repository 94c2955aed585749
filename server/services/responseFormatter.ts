import type { Club, Coach, MatchedEntity, ResponseStyle } from "@shared/schema";

export interface ResponseInput {
  question: string;
  entity: MatchedEntity;
  club: Club;
  coach: Coach | null;
  biography: string | null;
}

export const SYSTEM_PROMPT = "You are a helpful assistant answering questions about the current coach "
  + "of football clubs in Germany's 1. Bundesliga.";

export function noCoachPhrase(club: Club): string {
  return `I couldn't find the current head coach of ${club.name}.`;
}

export function noBiographyPhrase(coach: Coach): string {
  return `No biography is available for ${coach.name}.`;
}

function formatSentence(input: ResponseInput): string {
  const { entity, club, coach, biography } = input;
  const intro = entity.kind === 'city' ? `${entity.city.name} is home to ${club.name}. ` : '';
  if (!coach) {
    return `${intro}${noCoachPhrase(club)}`;
  }
  return `${intro}The current head coach of ${club.name} is ${coach.name}.\n\n${biography ?? noBiographyPhrase(coach)}`;
}

function formatPrompt(input: ResponseInput): string {
  const { question, entity, club, coach, biography } = input;
  const lines = [
    `System: ${SYSTEM_PROMPT}`,
    `User question: ${question}`,
    '',
    'Information retrieved:',
    `Club: ${club.name}`,
  ];
  if (entity.kind === 'city') {
    lines.push(`City: ${entity.city.name}`);
  }
  lines.push(`Coach: ${coach ? coach.name : noCoachPhrase(club)}`);
  if (coach) {
    lines.push(`Biography: ${biography ?? noBiographyPhrase(coach)}`);
  }
  return lines.join('\n');
}

/**
 * Compose the answer for one matched question. `prompt` produces a template
 * for a downstream language model, `sentence` a plain reply.
 */
export function formatResponse(input: ResponseInput, style: ResponseStyle = 'prompt'): string {
  return style === 'sentence' ? formatSentence(input) : formatPrompt(input);
}

export function formatUnknownQuery(): string {
  return 'No club or city name recognized in your question. Please try again.';
}

export function formatUnavailable(reason: string): string {
  return `Could not retrieve clubs and cities data (${reason}). Exiting.`;
}
