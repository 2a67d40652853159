import { existsSync } from "fs";
import { join } from "path";
import { homedir } from "os";

// ---------------------------------------------------------------------------
// Known Steam root paths (checked in order)
// ---------------------------------------------------------------------------

/**
 * Install locations of the Linux Steam client, native package first,
 * then Flatpak and Snap.
 */
export function steamRootCandidates(home: string = homedir()): string[] {
  return [
    join(home, ".steam", "steam"),
    join(home, ".steam", "root"),
    join(home, ".local", "share", "Steam"),
    join(home, ".steam", "debian-installation"),
    join(home, ".var", "app", "com.valvesoftware.Steam", ".local", "share", "Steam"),
    join(home, "snap", "steam", "common", ".local", "share", "Steam"),
  ];
}

/**
 * Returns the Steam installation root: `override` when set, otherwise the
 * first candidate that exists, or null if none does.
 */
export function detectSteamRoot(
  override: string = "",
  candidates: readonly string[] = steamRootCandidates(),
): string | null {
  if (override) return override;
  for (const root of candidates) {
    if (existsSync(root)) return root;
  }
  return null;
}

/** The statistics schema Steam caches for each app it has seen. */
export function statsSchemaPath(steamRoot: string, appId: number): string {
  return join(steamRoot, "appcache", "stats", `UserGameStatsSchema_${appId}.bin`);
}
