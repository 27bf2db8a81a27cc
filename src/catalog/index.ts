export {
  CITIES,
  QUERY_TEMPLATES,
  LEGACY_QUERIES,
  CITY_TOKEN,
  renderQuery,
  buildQueryCatalog,
} from './queries.js';
