import { HttpStatusError, type SummaryFetch } from "./providers";

/**
 * First non-empty paragraph of an encyclopedia extract.
 */
export function leadParagraph(extract: string): string | null {
  const paragraph = extract
    .split(/\n+/)
    .map(part => part.trim())
    .find(part => part.length > 0);
  return paragraph ?? null;
}

export class BiographyService {
  constructor(private readonly summaries: SummaryFetch) {}

  async fetchBiography(title: string): Promise<string | null> {
    const pageTitle = title.trim();
    if (!pageTitle) {
      return null;
    }

    try {
      const summary = await this.summaries.fetchSummary(pageTitle);
      if (summary.type === 'disambiguation') {
        console.warn(`[biography] "${pageTitle}" is a disambiguation page`);
        return null;
      }
      return leadParagraph(summary.extract);
    } catch (error) {
      if (error instanceof HttpStatusError && error.status === 404) {
        console.warn(`[biography] No encyclopedia article for "${pageTitle}"`);
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[biography] Wikipedia request failed for "${pageTitle}":`, message);
      return null;
    }
  }
}
