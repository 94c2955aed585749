import type { GraphRow } from "../providers";

export const entityUri = (id: string) => `http://www.wikidata.org/entity/${id}`;

export function referenceRow(
  club: [id: string, label: string],
  city: [id: string, label: string],
  alt: { club?: string; city?: string } = {},
): GraphRow {
  const row: GraphRow = {
    club: entityUri(club[0]),
    clubLabel: club[1],
    city: entityUri(city[0]),
    cityLabel: city[1],
  };
  if (alt.club) row.altClubLabel = alt.club;
  if (alt.city) row.altCityLabel = alt.city;
  return row;
}

export function coachRow(id: string, label: string, extra: { since?: string; article?: string } = {}): GraphRow {
  const row: GraphRow = { coach: entityUri(id), coachLabel: label };
  if (extra.since) row.since = extra.since;
  if (extra.article) row.article = extra.article;
  return row;
}

const BAYERN: [string, string] = ['Q15789', 'FC Bayern Munich'];
const DORTMUND: [string, string] = ['Q41420', 'Borussia Dortmund'];
const ST_PAULI: [string, string] = ['Q155207', 'FC St. Pauli'];
const HSV: [string, string] = ['Q51974', 'Hamburger SV'];
const UNION: [string, string] = ['Q152515', '1. FC Union Berlin'];
const HERTHA: [string, string] = ['Q49766', 'Hertha BSC'];
const GLADBACH: [string, string] = ['Q153236', 'Borussia Mönchengladbach'];
const FRANKFURT: [string, string] = ['Q38245', 'Eintracht Frankfurt'];

const MUNICH: [string, string] = ['Q1726', 'Munich'];
const DORTMUND_CITY: [string, string] = ['Q1295', 'Dortmund'];
const HAMBURG: [string, string] = ['Q1055', 'Hamburg'];
const BERLIN: [string, string] = ['Q64', 'Berlin'];
const MONCHENGLADBACH: [string, string] = ['Q3920', 'Mönchengladbach'];
const FRANKFURT_CITY: [string, string] = ['Q1794', 'Frankfurt'];

export const CLUB_IDS = {
  bayern: BAYERN[0],
  dortmund: DORTMUND[0],
  stPauli: ST_PAULI[0],
  hsv: HSV[0],
  union: UNION[0],
  hertha: HERTHA[0],
  gladbach: GLADBACH[0],
  frankfurt: FRANKFURT[0],
} as const;

export const CITY_IDS = {
  munich: MUNICH[0],
  hamburg: HAMBURG[0],
  berlin: BERLIN[0],
  frankfurt: FRANKFURT_CITY[0],
} as const;

/** Rows shaped like the reference query's result, one alternate label per row. */
export const REFERENCE_ROWS: GraphRow[] = [
  referenceRow(BAYERN, MUNICH, { club: 'Bayern', city: 'München' }),
  referenceRow(BAYERN, MUNICH, { club: 'FC Bayern' }),
  referenceRow(BAYERN, MUNICH, { club: 'Bayern Munich' }),
  referenceRow(BAYERN, MUNICH, { club: 'FCB' }),
  referenceRow(DORTMUND, DORTMUND_CITY, { club: 'BVB' }),
  referenceRow(ST_PAULI, HAMBURG, { club: 'St. Pauli' }),
  referenceRow(HSV, HAMBURG, { club: 'HSV' }),
  referenceRow(UNION, BERLIN, { club: 'Union Berlin' }),
  referenceRow(UNION, BERLIN, { club: 'Eisern Union' }),
  referenceRow(HERTHA, BERLIN, { club: 'Hertha' }),
  referenceRow(GLADBACH, MONCHENGLADBACH, { club: "Borussia M'gladbach" }),
  referenceRow(FRANKFURT, FRANKFURT_CITY, { club: 'Eintracht', city: 'Frankfurt am Main' }),
  referenceRow(FRANKFURT, FRANKFURT_CITY, { club: 'SGE' }),
];

/** A club whose name contains "Pauli" and sorts before FC St. Pauli. */
export const DECOY_PAULI_ROW = referenceRow(['Q999001', 'Blau-Weiss Pauli'], BERLIN);
