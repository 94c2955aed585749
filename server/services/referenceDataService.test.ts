import { afterEach, describe, expect, it, vi } from "vitest";
import { CITY_IDS, CLUB_IDS, REFERENCE_ROWS, entityUri, referenceRow } from "./__fixtures__/bundesliga";
import type { GraphQuery } from "./providers";
import { ReferenceDataService, buildAliasIndex, buildReferenceQuery } from "./referenceDataService";

function createGraph(impl: GraphQuery['runGraphQuery']) {
  return { runGraphQuery: vi.fn(impl) };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("buildReferenceQuery", () => {
  it("filters every label to the requested language", () => {
    const query = buildReferenceQuery("de");
    expect(query).toContain('FILTER(LANG(?clubLabel) = "de")');
    expect(query).toContain('FILTER(LANG(?altCityLabel) = "de")');
    expect(query).toContain("wdt:P118 wd:Q82595");
  });
});

describe("buildAliasIndex", () => {
  const index = buildAliasIndex(REFERENCE_ROWS);

  it("folds alias rows into one club each", () => {
    expect(index.clubs).toHaveLength(8);
    const bayern = index.clubs.find(club => club.id === CLUB_IDS.bayern);
    expect(bayern?.name).toBe("FC Bayern Munich");
    expect(bayern?.aliases).toEqual(["Bayern", "FC Bayern", "Bayern Munich", "FCB"]);
    expect(bayern?.cityId).toBe(CITY_IDS.munich);
  });

  it("builds cities from home cities with their clubs in canonical order", () => {
    expect(index.cities.map(city => city.name)).toEqual([
      "Berlin",
      "Dortmund",
      "Frankfurt",
      "Hamburg",
      "Mönchengladbach",
      "Munich",
    ]);
    const berlin = index.cities.find(city => city.id === CITY_IDS.berlin);
    expect(berlin?.clubIds).toEqual([CLUB_IDS.union, CLUB_IDS.hertha]);
    expect(index.cities.find(city => city.id === CITY_IDS.munich)?.aliases).toEqual(["München"]);
  });

  it("indexes normalised aliases", () => {
    expect(index.lookup("munchen").map(entity => entity.kind)).toEqual(["city"]);
    expect(index.lookup("borussia m gladbach")).toHaveLength(1);
    expect(index.lookup("Bayern")).toEqual([]);
  });

  it("keeps the first home city seen for a club", () => {
    const rows = [
      referenceRow(["Q1", "Test Club"], ["Q10", "First City"]),
      referenceRow(["Q1", "Test Club"], ["Q20", "Second City"], { city: "Other Name" }),
    ];
    const twoCities = buildAliasIndex(rows);
    expect(twoCities.clubs[0].cityId).toBe("Q10");
    expect(twoCities.cities.map(city => city.id)).toEqual(["Q10"]);
  });

  it("skips rows without usable ids or labels", () => {
    const rows = [
      { club: entityUri("Q1"), clubLabel: "Test Club", city: "not-an-entity", cityLabel: "Nowhere" },
      { club: entityUri("Q2"), clubLabel: "  ", city: entityUri("Q10"), cityLabel: "Somewhere" },
    ];
    expect(buildAliasIndex(rows).clubs).toHaveLength(0);
  });

  it("cannot be modified after construction", () => {
    expect(Object.isFrozen(index)).toBe(true);
    expect(Object.isFrozen(index.clubs)).toBe(true);
    expect(Object.isFrozen(index.entries[0])).toBe(true);
  });
});

describe("ReferenceDataService", () => {
  it("returns the index built from the graph query", async () => {
    const graph = createGraph(async () => REFERENCE_ROWS);
    const result = await new ReferenceDataService(graph, "en").fetchReferenceData();

    expect(graph.runGraphQuery).toHaveBeenCalledWith(buildReferenceQuery("en"));
    expect(result.status).toBe("ok");
    if (result.status === "ok") {
      expect(result.index.clubs).toHaveLength(8);
    }
  });

  it("reports failures as unavailable", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const graph = createGraph(async () => {
      throw new Error("HTTP 503 Service Unavailable");
    });

    const result = await new ReferenceDataService(graph, "en").fetchReferenceData();

    expect(result).toEqual({ status: "unavailable", reason: "HTTP 503 Service Unavailable" });
    expect(errorSpy).toHaveBeenCalledWith("[reference-data] Wikidata request failed:", "HTTP 503 Service Unavailable");
  });

  it("treats an empty result as unavailable", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const graph = createGraph(async () => []);

    const result = await new ReferenceDataService(graph, "en").fetchReferenceData();

    expect(result).toEqual({ status: "unavailable", reason: "the knowledge graph returned no Bundesliga clubs" });
  });
});
