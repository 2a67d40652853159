import { readFileSync, writeFileSync, existsSync, copyFileSync, mkdirSync } from "fs";
import { resolve, join } from "path";
import { z } from "zod";
import { logger } from "../../logger.js";
import { DEFAULT_MAX_FRAME_BYTES } from "../ipc/index.js";

const log = logger.child({ module: "settings" });

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const DEFAULT_APP_LIST_URL = "https://gib.me/sam/games.xml";

export const HttpUrl = z
  .string()
  .url()
  .refine((u) => /^https?:\/\//i.test(u), { message: "URL must use http or https" });

const Milliseconds = z.number().int().positive();

export const SettingsSchema = z.object({
  /** XML catalog of every app id the catalog knows about. */
  appListUrl: HttpUrl.default(DEFAULT_APP_LIST_URL),
  /** A cached catalog younger than this is used instead of downloading. */
  catalogMaxAgeHours: z.number().int().min(0).default(168),
  /** Supervisor → worker round trip. */
  ipcTimeoutMs: Milliseconds.default(30_000),
  /** UI → supervisor round trip. */
  requestTimeoutMs: Milliseconds.default(60_000),
  /** How long a child gets to exit after Shutdown before it is killed. */
  shutdownTimeoutMs: Milliseconds.default(5_000),
  maxFrameBytes: z.number().int().min(1024).default(DEFAULT_MAX_FRAME_BYTES),
  /** Absolute path, or empty to auto-detect. */
  steamRoot: z
    .string()
    .refine((p) => p === "" || p.startsWith("/"), {
      message: "Path must be an absolute path starting with /",
    })
    .default(""),
  /** Module specifier of the native binding. Empty means none. */
  nativeModule: z.string().trim().default(""),
  /** Empty means the native client's current language. */
  language: z.string().trim().default(""),
});

export type Settings = z.infer<typeof SettingsSchema>;

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------
const CONFIG_DIR = resolve(process.cwd(), "config");
const CONFIG_PATH = join(CONFIG_DIR, "settings.json");
const EXAMPLE_PATH = resolve(process.cwd(), "config.example.json");

// ---------------------------------------------------------------------------
// Internal state
// ---------------------------------------------------------------------------
let _settings: Settings | null = null;

function ensureConfigExists(): void {
  if (existsSync(CONFIG_PATH)) return;

  mkdirSync(CONFIG_DIR, { recursive: true });
  if (existsSync(EXAMPLE_PATH)) {
    copyFileSync(EXAMPLE_PATH, CONFIG_PATH);
    log.info({ path: CONFIG_PATH }, "Created settings from example template");
  } else {
    writeSettingsFile(SettingsSchema.parse({}));
    log.info({ path: CONFIG_PATH }, "Created settings with defaults");
  }
}

function writeSettingsFile(settings: Settings): void {
  writeFileSync(CONFIG_PATH, JSON.stringify(settings, null, 2) + "\n", "utf-8");
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Loads settings from disk, creating config/settings.json from the example
 * template if it does not exist yet. Cached in memory after first load.
 */
export async function loadSettings(): Promise<Settings> {
  if (_settings) return _settings;

  ensureConfigExists();

  const raw: unknown = JSON.parse(readFileSync(CONFIG_PATH, "utf-8"));
  _settings = SettingsSchema.parse(raw);
  return _settings;
}

/**
 * Returns the cached settings. loadSettings() must have been called first.
 */
export function getSettings(): Settings {
  if (!_settings) throw new Error("Settings not loaded, call loadSettings() first");
  return _settings;
}

/**
 * Merges a partial patch into the current settings and persists to disk.
 * Processes that are already running keep the values they started with.
 */
export function updateSettings(patch: Partial<Settings>): Settings {
  const current = getSettings();
  const next = SettingsSchema.parse({ ...current, ...patch });
  writeSettingsFile(next);
  _settings = next;
  return next;
}
