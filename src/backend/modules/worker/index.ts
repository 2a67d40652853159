export { runWorker, handleWorkerCommand, type WorkerOptions } from "./worker.js";
export { AppManager, type AppManagerOptions } from "./app-manager.js";
export {
  readStatsSchema,
  localizedString,
  statTypeOf,
  StatType,
  type AchievementDefinition,
  type FloatStatDefinition,
  type IntegerStatDefinition,
  type StatDefinition,
  type StatsSchema,
} from "./stats-schema.js";
