/**
 * ============================================================
 *  Statistics schema — KeyValue tree → stat/achievement definitions
 * ============================================================
 *
 * Steam caches one schema per app:
 *
 *   <appId>
 *     stats
 *       <n>
 *         type_int | type      1 int, 2 float, 3 avg-rate, 4/5 achievements
 *         name
 *         display { name { <language> | english } }
 *         min / max / maxchange / incrementonly / default / permission
 *         bits                 (achievement groups only)
 *           <n> { name, permission, display { name, desc, icon, icon_gray, hidden } }
 *
 * Definitions carry what the schema says; live values come from the
 * native session (see app-manager.ts).
 * ============================================================
 */
import { KeyValue } from "../key-value/index.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "stats-schema" });

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const StatType = {
  Integer:           1,
  Float:             2,
  AverageRate:       3,
  Achievements:      4,
  GroupAchievements: 5,
} as const;

interface BaseStatDefinition {
  id: string;
  appId: number;
  displayName: string;
  permission: number;
}

export interface IntegerStatDefinition extends BaseStatDefinition {
  kind: "integer";
  minValue: number;
  maxValue: number;
  maxChange: number;
  incrementOnly: boolean;
  setByTrustedGameServer: boolean;
  defaultValue: number;
}

export interface FloatStatDefinition extends BaseStatDefinition {
  kind: "float";
  minValue: number;
  maxValue: number;
  maxChange: number;
  incrementOnly: boolean;
  defaultValue: number;
}

export type StatDefinition = IntegerStatDefinition | FloatStatDefinition;

export interface AchievementDefinition {
  id: string;
  appId: number;
  name: string;
  description: string;
  iconNormal: string;
  iconLocked: string;
  isHidden: boolean;
  permission: number;
}

export interface StatsSchema {
  achievements: AchievementDefinition[];
  stats: StatDefinition[];
}

const I32_MIN = -2147483648;
const I32_MAX = 2147483647;
const F32_MAX = 3.4028234663852886e38;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Picks the requested language, then english, then the node's own value.
 * Empty strings count as missing at every step.
 */
export function localizedString(node: KeyValue, language: string, fallback: string): string {
  const localized = node.get(language).asString("");
  if (localized) return localized;

  if (language !== "english") {
    const english = node.get("english").asString("");
    if (english) return english;
  }

  return node.asString("") || fallback;
}

/** `type_int` when present, otherwise `type`. */
export function statTypeOf(stat: KeyValue): number {
  const typeInt = stat.get("type_int");
  return typeInt.valid ? typeInt.asI32(0) : stat.get("type").asI32(0);
}

function readIntegerStat(stat: KeyValue, appId: number, language: string): IntegerStatDefinition {
  const id = stat.get("name").asString("");
  return {
    kind:                   "integer",
    id,
    appId,
    displayName:            localizedString(stat.get("display").get("name"), language, id),
    minValue:               stat.get("min").asI32(I32_MIN),
    maxValue:               stat.get("max").asI32(I32_MAX),
    maxChange:              stat.get("maxchange").asI32(0),
    incrementOnly:          stat.get("incrementonly").asBool(false),
    setByTrustedGameServer: stat.get("setbytrustedgs").asBool(false),
    defaultValue:           stat.get("default").asI32(0),
    permission:             stat.get("permission").asI32(0),
  };
}

function readFloatStat(stat: KeyValue, appId: number, language: string): FloatStatDefinition {
  const id = stat.get("name").asString("");
  return {
    kind:          "float",
    id,
    appId,
    displayName:   localizedString(stat.get("display").get("name"), language, id),
    minValue:      stat.get("min").asF32(-F32_MAX),
    maxValue:      stat.get("max").asF32(F32_MAX),
    maxChange:     stat.get("maxchange").asF32(0),
    incrementOnly: stat.get("incrementonly").asBool(false),
    defaultValue:  stat.get("default").asF32(0),
    permission:    stat.get("permission").asI32(0),
  };
}

function readAchievementBits(stat: KeyValue, appId: number, language: string): AchievementDefinition[] {
  const achievements: AchievementDefinition[] = [];
  for (const [name, bits] of stat.children) {
    if (name.toLowerCase() !== "bits") continue;

    for (const bit of bits.children.values()) {
      const id = bit.get("name").asString("");
      const display = bit.get("display");
      achievements.push({
        id,
        appId,
        name:        localizedString(display.get("name"), language, id),
        description: localizedString(display.get("desc"), language, ""),
        iconNormal:  display.get("icon").asString(""),
        iconLocked:  display.get("icon_gray").asString(""),
        isHidden:    display.get("hidden").asBool(false),
        permission:  bit.get("permission").asI32(0),
      });
    }
  }
  return achievements;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Reads the definitions for `appId` out of a decoded schema file.
 * A schema without a stats section yields empty lists; entries of an
 * unknown type are skipped.
 */
export function readStatsSchema(root: KeyValue, appId: number, language: string): StatsSchema {
  const schema: StatsSchema = { achievements: [], stats: [] };
  const stats = root.get(String(appId)).get("stats");

  for (const stat of stats.children.values()) {
    const type = statTypeOf(stat);
    switch (type) {
      case StatType.Integer:
        schema.stats.push(readIntegerStat(stat, appId, language));
        break;
      case StatType.Float:
      case StatType.AverageRate:
        schema.stats.push(readFloatStat(stat, appId, language));
        break;
      case StatType.Achievements:
      case StatType.GroupAchievements:
        schema.achievements.push(...readAchievementBits(stat, appId, language));
        break;
      default:
        log.warn({ appId, stat: stat.name, type }, "Skipping stat of unknown type");
    }
  }

  return schema;
}
