interface KnownPlace {
  canonical: string;
  aliases: string[];
}

// List order decides when a text names several places.
const KNOWN_CITIES: ReadonlyArray<KnownPlace> = [
  { canonical: "CDMX", aliases: ["CDMX", "Ciudad de México", "Ciudad de Mexico"] },
  { canonical: "Guadalajara", aliases: ["Guadalajara"] },
  { canonical: "Monterrey", aliases: ["Monterrey"] },
  { canonical: "Querétaro", aliases: ["Querétaro", "Queretaro"] },
  { canonical: "Puebla", aliases: ["Puebla"] },
];

const KNOWN_AREAS: ReadonlyArray<KnownPlace> = [
  { canonical: "Roma Norte", aliases: ["Roma Norte"] },
  { canonical: "Roma Sur", aliases: ["Roma Sur"] },
  { canonical: "Condesa", aliases: ["Condesa"] },
  { canonical: "Polanco", aliases: ["Polanco"] },
  { canonical: "Del Valle", aliases: ["Del Valle"] },
  { canonical: "Coyoacán", aliases: ["Coyoacán", "Coyoacan"] },
  { canonical: "Santa Fe", aliases: ["Santa Fe"] },
  { canonical: "Narvarte", aliases: ["Narvarte"] },
  { canonical: "Juárez", aliases: ["Juárez", "Juarez"] },
  { canonical: "Doctores", aliases: ["Doctores"] },
  { canonical: "Providencia", aliases: ["Providencia"] },
  { canonical: "Chapalita", aliases: ["Chapalita"] },
  { canonical: "Zapopan", aliases: ["Zapopan"] },
  { canonical: "San Pedro", aliases: ["San Pedro"] },
  { canonical: "Cumbres", aliases: ["Cumbres"] },
  { canonical: "Valle Oriente", aliases: ["Valle Oriente"] },
];

const CITY_MATCHERS = compilePlaces(KNOWN_CITIES);
const AREA_MATCHERS = compilePlaces(KNOWN_AREAS);

export function parseCity(text: string): string | null {
  return findFirstPlace(text, CITY_MATCHERS);
}

export function parseArea(text: string): string | null {
  return findFirstPlace(text, AREA_MATCHERS);
}

function findFirstPlace(
  text: string,
  matchers: ReadonlyArray<{ canonical: string; patterns: RegExp[] }>,
): string | null {
  for (const matcher of matchers) {
    if (matcher.patterns.some((pattern) => pattern.test(text))) {
      return matcher.canonical;
    }
  }
  return null;
}

function compilePlaces(
  places: ReadonlyArray<KnownPlace>,
): Array<{ canonical: string; patterns: RegExp[] }> {
  return places.map((place) => ({
    canonical: place.canonical,
    patterns: place.aliases.map(wholeWordPattern),
  }));
}

export function wholeWordPattern(phrase: string): RegExp {
  const body = phrase
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join(String.raw`\s+`);
  return new RegExp(String.raw`(?<![\p{L}\p{N}])${body}(?![\p{L}\p{N}])`, "iu");
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
