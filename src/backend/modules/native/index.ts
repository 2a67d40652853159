export type {
  AchievementState,
  CatalogSession,
  NativeBindingModule,
  NativeClient,
  UserStatsSession,
} from "./types.js";

export {
  createUnavailableClient,
  isNativeClient,
  loadNativeClient,
  openCatalogSession,
  openUserStatsSession,
  toImportSpecifier,
} from "./loader.js";

export { detectSteamRoot, statsSchemaPath, steamRootCandidates } from "./steam-paths.js";
