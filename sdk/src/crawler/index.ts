export { Crawler, DYNAMIC_FIELD_PAGE_SIZE, OBJECT_BATCH_SIZE, type CrawlerOptions, type Schema } from "./crawler.js";
export { Response } from "./response.js";
export { ValueMap, canonicalKey } from "./value-map.js";
export * from "./collections.js";
