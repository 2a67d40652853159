import { isAbsolute, resolve } from "path";
import { pathToFileURL } from "url";
import { logger } from "../../logger.js";
import { UnlockdError } from "../ipc/index.js";
import type { Settings } from "../settings/index.js";
import type { CatalogSession, NativeClient, UserStatsSession } from "./types.js";

const log = logger.child({ module: "native" });

// ---------------------------------------------------------------------------
// Fallback client
// ---------------------------------------------------------------------------

/**
 * A client that cannot reach Steam. Every connection attempt fails with
 * SteamConnectionFailed, so the process tree still runs and reports the
 * failure per command.
 */
export function createUnavailableClient(reason: string): NativeClient {
  const fail = async (): Promise<never> => {
    throw new UnlockdError("SteamConnectionFailed", reason);
  };
  return { connectCatalog: fail, connectApp: fail };
}

// ---------------------------------------------------------------------------
// Module loading
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isNativeClient(value: unknown): value is NativeClient {
  return (
    isRecord(value) &&
    typeof value.connectCatalog === "function" &&
    typeof value.connectApp === "function"
  );
}

/** Relative and absolute paths resolve against the working directory; bare names go through node_modules. */
export function toImportSpecifier(nativeModule: string, cwd: string = process.cwd()): string {
  if (isAbsolute(nativeModule) || nativeModule.startsWith(".")) {
    return pathToFileURL(resolve(cwd, nativeModule)).href;
  }
  return nativeModule;
}

/**
 * Loads the binding named by `settings.nativeModule`. When none is set or
 * it cannot be loaded, returns the unavailable client instead of throwing.
 */
export async function loadNativeClient(settings: Pick<Settings, "nativeModule">): Promise<NativeClient> {
  if (!settings.nativeModule) {
    log.warn("No native module configured, Steam features disabled");
    return createUnavailableClient("No native module configured");
  }

  try {
    const mod: unknown = await import(toImportSpecifier(settings.nativeModule));
    const factory = isRecord(mod) ? mod.createNativeClient : undefined;
    if (typeof factory !== "function") {
      throw new Error("module does not export createNativeClient()");
    }
    const client: unknown = await factory();
    if (!isNativeClient(client)) {
      throw new Error("createNativeClient() did not return a native client");
    }
    log.info({ nativeModule: settings.nativeModule }, "Native module loaded");
    return client;
  } catch (err) {
    log.warn({ err, nativeModule: settings.nativeModule }, "Native module not available, Steam features disabled");
    return createUnavailableClient(`Native module ${settings.nativeModule} could not be loaded`);
  }
}

// ---------------------------------------------------------------------------
// Connecting
// ---------------------------------------------------------------------------

function connectionFailed(err: unknown, message: string): UnlockdError {
  if (err instanceof UnlockdError && err.kind === "SteamConnectionFailed") return err;
  return new UnlockdError("SteamConnectionFailed", message, { cause: err });
}

/** connectCatalog() with every failure reported as SteamConnectionFailed. */
export async function openCatalogSession(client: NativeClient): Promise<CatalogSession> {
  try {
    return await client.connectCatalog();
  } catch (err) {
    throw connectionFailed(err, "Could not connect to the Steam client");
  }
}

/** connectApp() with every failure reported as SteamConnectionFailed. */
export async function openUserStatsSession(client: NativeClient, appId: number): Promise<UserStatsSession> {
  try {
    return await client.connectApp(appId);
  } catch (err) {
    throw connectionFailed(err, `Could not connect to the Steam client as app ${appId}`);
  }
}
