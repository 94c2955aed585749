import type { ResponseStyle } from "@shared/schema";
import type { AliasIndex } from "./aliasIndex";
import type { BiographyService } from "./biographyService";
import type { CoachService } from "./coachService";
import { match, resolveClub } from "./entityMatcher";
import { formatResponse, formatUnknownQuery } from "./responseFormatter";
import { normalize } from "./textNormalizer";

export interface CoachQueryServiceOptions {
  responseStyle: ResponseStyle;
}

/**
 * Answers one question: normalise, match, fetch coach, fetch biography, format.
 * Holds no state besides the index it was built with.
 */
export class CoachQueryService {
  constructor(
    private readonly index: AliasIndex,
    private readonly coaches: CoachService,
    private readonly biographies: BiographyService,
    private readonly options: CoachQueryServiceOptions = { responseStyle: 'prompt' },
  ) {}

  async answer(question: string): Promise<string> {
    const entity = match(normalize(question), this.index);
    const club = entity ? resolveClub(entity) : null;
    if (!entity || !club) {
      return formatUnknownQuery();
    }

    const coach = await this.coaches.fetchCoach(club);
    const biography = coach ? await this.biographies.fetchBiography(coach.articleTitle ?? coach.name) : null;

    return formatResponse({
      question: question.trim(),
      entity,
      club,
      coach,
      biography,
    }, this.options.responseStyle);
  }
}
