export { config } from "./config";
export * from "./errors";
export {
  FacebookClient,
  MAX_RESULTS_PER_PAGE,
  type FacebookClientOptions,
  type GraphHttpClient,
  type PagePostsQuery,
} from "./services/facebook.service";
export * from "./traced-data";
export * from "./types";
export {
  cleanPostType,
  convertFacebookCommentsToTracedData,
  FACEBOOK_UUID_KEY,
} from "./utils/mappers";
export {
  dateToFacebookTime,
  normalizeIsoString,
  parseIsoString,
  toUtcIsoString,
  utcNowAsIsoString,
  validateUtcIsoString,
} from "./utils/time";
export * from "./uuid";
