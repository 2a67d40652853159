export {
  listOwnedApps,
  loadAppList,
  buildAppModel,
  resolveImageUrl,
  parseAppType,
  parseMetacriticScore,
  type CatalogOptions,
} from "./catalog.js";

export {
  parseAppList,
  downloadAppList,
  type CatalogEntry,
  type Fetcher,
  type TextResponse,
} from "./app-list.js";

export { readCachedAppList, writeCachedAppList } from "./cache.js";
