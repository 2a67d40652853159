/**
 * Contract between unlockd and a binding to the locally running Steam
 * client. The binding itself lives outside this repository and is loaded
 * at run time (see loader.ts).
 *
 * Every method may reject; callers map rejections to ErrorKinds.
 */

/** Catalog-level view: one per supervisor connection. */
export interface CatalogSession {
  isSubscribedApp(appId: number): Promise<boolean>;
  /**
   * Raw app data lookup, e.g. "name", "logo", "developer",
   * "metacritic_score", "small_capsule/<language>".
   * Null when the client has no value for the key.
   */
  getAppData(appId: number, key: string): Promise<string | null>;
  getCurrentGameLanguage(): Promise<string>;
  shutdown(): Promise<void>;
}

export interface AchievementState {
  achieved: boolean;
  /** Unix seconds; 0 while locked. */
  unlockTime: number;
}

/**
 * Statistics view for one app id. A worker holds exactly one, opened at
 * startup; the client resolves connectApp once the user's current stats
 * have been received.
 */
export interface UserStatsSession {
  readonly appId: number;
  getCurrentGameLanguage(): Promise<string>;
  getAchievement(id: string): Promise<AchievementState>;
  /** Null when global percentages are not available for this app. */
  getAchievementAchievedPercent(id: string): Promise<number | null>;
  setAchievement(id: string): Promise<void>;
  clearAchievement(id: string): Promise<void>;
  getStatInt(id: string): Promise<number>;
  getStatFloat(id: string): Promise<number>;
  setStatInt(id: string, value: number): Promise<void>;
  setStatFloat(id: string, value: number): Promise<void>;
  /** Commits pending changes; false when the client refused them. */
  storeStats(): Promise<boolean>;
  resetAllStats(achievementsToo: boolean): Promise<boolean>;
  disconnect(): Promise<void>;
}

export interface NativeClient {
  connectCatalog(): Promise<CatalogSession>;
  connectApp(appId: number): Promise<UserStatsSession>;
}

/** What a binding module must export. */
export interface NativeBindingModule {
  createNativeClient(): NativeClient | Promise<NativeClient>;
}
