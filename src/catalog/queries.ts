/**
 * Query Catalog
 *
 * Builds the search queries as the Cartesian product of query templates
 * and cities. Pure and deterministic: templates vary slowest.
 *
 * @module catalog/queries
 */

/** Token replaced by the city name in a template */
export const CITY_TOKEN = '{city}';

/**
 * Metro areas searched for courts.
 */
export const CITIES: readonly string[] = [
  'Phoenix, AZ',
  'Scottsdale, AZ',
  'Mesa, AZ',
  'Los Angeles, CA',
  'San Diego, CA',
  'Palm Springs, CA',
  'Austin, TX',
  'Houston, TX',
  'Dallas, TX',
  'Denver, CO',
  'Seattle, WA',
  'Portland, OR',
  'Naples, FL',
  'Tampa, FL',
  'Orlando, FL',
  'Miami, FL',
  'Salt Lake City, UT',
  'Las Vegas, NV',
  'Atlanta, GA',
  'Chicago, IL',
  'New York, NY',
  'Charlotte, NC',
  'Minneapolis, MN',
  'Kansas City, MO',
  'Pittsburgh, PA',
];

/**
 * Query templates. The first one is the only query earlier releases ran.
 */
export const QUERY_TEMPLATES: readonly string[] = [
  `pickleball courts near ${CITY_TOKEN}`,
  `indoor pickleball courts in ${CITY_TOKEN}`,
  `pickleball club ${CITY_TOKEN}`,
];

/**
 * Fill a template with a city.
 */
export function renderQuery(template: string, city: string): string {
  return template.split(CITY_TOKEN).join(city);
}

/**
 * Build every (template × city) query, in order, without duplicates.
 */
export function buildQueryCatalog(
  templates: readonly string[] = QUERY_TEMPLATES,
  cities: readonly string[] = CITIES
): string[] {
  const queries: string[] = [];
  const seen = new Set<string>();

  for (const template of templates) {
    for (const city of cities) {
      const query = renderQuery(template, city);
      if (!seen.has(query)) {
        seen.add(query);
        queries.push(query);
      }
    }
  }

  return queries;
}

/**
 * Queries assumed to have run when a court table exists without a
 * checkpoint: the first template over every city.
 */
export const LEGACY_QUERIES: readonly string[] = buildQueryCatalog(
  QUERY_TEMPLATES.slice(0, 1),
  CITIES
);
