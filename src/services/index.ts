export { DefaultMemoryService, matchesFilters } from "./memory-service";
export { DefaultSearchService } from "./search-service";
export { DefaultSimilarityService, buildSimilarityQuery } from "./similarity-service";
export {
  DefaultDedupeService,
  buildDuplicateGroups,
  mergeDuplicateGroup,
  orderBySurvival,
} from "./dedupe-service";
export { detectTags } from "./auto-tag";
