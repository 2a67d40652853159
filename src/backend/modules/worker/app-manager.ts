import type { Logger } from "pino";
import { logger } from "../../logger.js";
import {
  UnlockdError,
  type AchievementInfo,
  type StatInfo,
} from "../ipc/index.js";
import { KeyValueError, type KeyValue } from "../key-value/index.js";
import type { AchievementState, UserStatsSession } from "../native/index.js";
import { readStatsSchema, type StatsSchema } from "./stats-schema.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AppManagerOptions {
  /** Supplies the decoded schema file; called at most once. */
  loadSchema: () => Promise<KeyValue>;
  /** Empty means ask the session for its current language. */
  language: string;
}

// ---------------------------------------------------------------------------
// AppManager
// ---------------------------------------------------------------------------

/**
 * Everything a worker does with its one native session: merges schema
 * definitions with live values and commits edits.
 *
 * Failures surface as UnlockdError; native rejections become UnknownError.
 */
export class AppManager {
  private schema: StatsSchema | null = null;
  private readonly log: Logger;

  constructor(
    readonly appId: number,
    private readonly session: UserStatsSession,
    private readonly options: AppManagerOptions,
  ) {
    this.log = logger.child({ module: "app-manager", appId });
  }

  private async native<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      this.log.warn({ err, operation }, "Native call failed");
      throw new UnlockdError("UnknownError", `Native call ${operation} failed`, { cause: err });
    }
  }

  private async loadSchema(): Promise<StatsSchema> {
    if (this.schema) return this.schema;

    const language =
      this.options.language ||
      (await this.native("getCurrentGameLanguage", () => this.session.getCurrentGameLanguage()));

    let root: KeyValue;
    try {
      root = await this.options.loadSchema();
    } catch (err) {
      if (err instanceof KeyValueError) {
        this.log.error({ err }, "Unable to read the statistics schema");
        throw new UnlockdError("UnknownError", err.message, { cause: err });
      }
      throw err;
    }

    this.schema = readStatsSchema(root, this.appId, language);
    this.log.debug(
      { language, achievements: this.schema.achievements.length, stats: this.schema.stats.length },
      "Statistics schema loaded",
    );
    return this.schema;
  }

  /** Achievements the client reports on; the rest are left out. */
  async getAchievements(): Promise<AchievementInfo[]> {
    const { achievements } = await this.loadSchema();
    const result: AchievementInfo[] = [];

    for (const def of achievements) {
      let state: AchievementState;
      try {
        state = await this.session.getAchievement(def.id);
      } catch (err) {
        this.log.debug({ err, achievement: def.id }, "Achievement has no state, skipped");
        continue;
      }

      let percent: number | null;
      try {
        percent = await this.session.getAchievementAchievedPercent(def.id);
      } catch {
        percent = null;
      }

      result.push({
        id:                    def.id,
        isAchieved:            state.achieved,
        unlockTime:            state.achieved && state.unlockTime > 0 ? state.unlockTime : null,
        permission:            def.permission,
        iconNormal:            def.iconNormal,
        iconLocked:            def.iconLocked,
        name:                  def.name,
        description:           def.description,
        globalAchievedPercent: percent,
      });
    }

    return result;
  }

  /** Stats the client reports on; originalValue is the value at read time. */
  async getStatistics(): Promise<StatInfo[]> {
    const { stats } = await this.loadSchema();
    const result: StatInfo[] = [];

    for (const def of stats) {
      const base = {
        id:              def.id,
        appId:           this.appId,
        displayName:     def.displayName,
        isIncrementOnly: def.incrementOnly,
        permission:      def.permission,
      };

      try {
        if (def.kind === "integer") {
          const value = await this.session.getStatInt(def.id);
          result.push({ kind: "integer", ...base, originalValue: value, value });
        } else {
          const value = await this.session.getStatFloat(def.id);
          result.push({ kind: "float", ...base, originalValue: value, value });
        }
      } catch (err) {
        this.log.debug({ err, stat: def.id }, "Stat has no value, skipped");
      }
    }

    return result;
  }

  private async commit(): Promise<void> {
    const stored = await this.native("storeStats", () => this.session.storeStats());
    if (!stored) throw new UnlockdError("UnknownError", "Steam refused to store stats");
  }

  async setAchievement(id: string, unlocked: boolean): Promise<void> {
    await this.native(unlocked ? "setAchievement" : "clearAchievement", () =>
      unlocked ? this.session.setAchievement(id) : this.session.clearAchievement(id),
    );
    await this.commit();
    this.log.info({ achievement: id, unlocked }, "Achievement updated");
  }

  /** Writes, commits and returns the value the client now holds. */
  async setIntStat(id: string, value: number): Promise<number> {
    await this.native("setStatInt", () => this.session.setStatInt(id, value));
    await this.commit();
    const stored = await this.native("getStatInt", () => this.session.getStatInt(id));
    this.log.info({ stat: id, value: stored }, "Integer stat updated");
    return stored;
  }

  /** Writes, commits and returns the value the client now holds. */
  async setFloatStat(id: string, value: number): Promise<number> {
    await this.native("setStatFloat", () => this.session.setStatFloat(id, value));
    await this.commit();
    const stored = await this.native("getStatFloat", () => this.session.getStatFloat(id));
    this.log.info({ stat: id, value: stored }, "Float stat updated");
    return stored;
  }

  async resetAllStats(achievementsToo: boolean): Promise<boolean> {
    const done = await this.native("resetAllStats", () => this.session.resetAllStats(achievementsToo));
    this.log.info({ achievementsToo, done }, "Stats reset");
    return done;
  }

  /** Releases the session; errors are logged, not thrown. */
  async disconnect(): Promise<void> {
    try {
      await this.session.disconnect();
    } catch (err) {
      this.log.warn({ err }, "Disconnect failed");
    }
  }
}
