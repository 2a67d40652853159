import { z } from "zod";

// ---------------------------------------------------------------------------
// Primitive ranges
// ---------------------------------------------------------------------------

export const AppIdSchema = z.number().int().min(0).max(0xffff_ffff);

export const Int32Schema = z.number().int().min(-2147483648).max(2147483647);

/** Largest finite f32. */
export const F32_MAX = 3.4028234663852886e38;

export const Float32Schema = z
  .number()
  .finite()
  .refine((v) => Math.abs(v) <= F32_MAX, { message: "Outside the f32 range" });

export type AppId = z.infer<typeof AppIdSchema>;

// ---------------------------------------------------------------------------
// Achievements
// ---------------------------------------------------------------------------

export const AchievementInfoSchema = z.object({
  id:                    z.string(),
  isAchieved:            z.boolean(),
  /** Unix seconds, null while locked */
  unlockTime:            z.number().int().nullable(),
  permission:            Int32Schema,
  iconNormal:            z.string(),
  iconLocked:            z.string(),
  name:                  z.string(),
  description:           z.string(),
  globalAchievedPercent: z.number().nullable(),
});

export type AchievementInfo = z.infer<typeof AchievementInfoSchema>;

// ---------------------------------------------------------------------------
// Stats
// ---------------------------------------------------------------------------

const StatBase = {
  id:              z.string(),
  appId:           AppIdSchema,
  displayName:     z.string(),
  isIncrementOnly: z.boolean(),
  permission:      Int32Schema,
};

export const IntStatInfoSchema = z.object({
  kind:          z.literal("integer"),
  ...StatBase,
  originalValue: Int32Schema,
  value:         Int32Schema,
});

export const FloatStatInfoSchema = z.object({
  kind:          z.literal("float"),
  ...StatBase,
  originalValue: Float32Schema,
  value:         Float32Schema,
});

export const StatInfoSchema = z.discriminatedUnion("kind", [
  IntStatInfoSchema,
  FloatStatInfoSchema,
]);

export type IntStatInfo = z.infer<typeof IntStatInfoSchema>;
export type FloatStatInfo = z.infer<typeof FloatStatInfoSchema>;
export type StatInfo = z.infer<typeof StatInfoSchema>;

/** Permission bit the native client uses for server-authoritative stats. */
export const PROTECTED_PERMISSION = 0b10;

export type StatFlag = "IncrementOnly" | "Protected" | "UnknownPermission";

/**
 * Derived flags shown next to a stat.
 * Any permission bit other than the protected one is reported as unknown.
 */
export function statFlags(stat: Pick<StatInfo, "isIncrementOnly" | "permission">): StatFlag[] {
  const flags: StatFlag[] = [];
  if (stat.isIncrementOnly) flags.push("IncrementOnly");
  if ((stat.permission & PROTECTED_PERMISSION) !== 0) flags.push("Protected");
  if ((stat.permission & ~PROTECTED_PERMISSION) !== 0) flags.push("UnknownPermission");
  return flags;
}

// ---------------------------------------------------------------------------
// Owned apps
// ---------------------------------------------------------------------------

export const APP_TYPES = ["App", "Mod", "Demo", "Junk"] as const;

export const AppTypeSchema = z.enum(APP_TYPES);

export type AppType = z.infer<typeof AppTypeSchema>;

export const AppModelSchema = z.object({
  appId:           AppIdSchema,
  appName:         z.string(),
  imageUrl:        z.string().nullable(),
  appType:         AppTypeSchema,
  developer:       z.string(),
  metacriticScore: z.number().int().min(0).max(255).nullable(),
});

export type AppModel = z.infer<typeof AppModelSchema>;
