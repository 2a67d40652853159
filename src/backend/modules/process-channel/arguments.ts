/**
 * Command-line contract between a parent and the processes it spawns.
 *
 *   <self> --orchestrator          --tx=<fd> --rx=<fd>   → supervisor
 *   <self> --app=<appId>           --tx=<fd> --rx=<fd>   → worker
 *   <self>                                               → UI process
 *
 * Anonymous pipes have no name a fresh process could look up, so the
 * descriptor numbers themselves travel on the command line.
 */
import { z } from "zod";

const DescriptorSchema = z.coerce.number().int().min(0);
const AppIdArgSchema = z.coerce.number().int().min(1).max(0xffff_ffff);

export interface PipeDescriptors {
  /** Descriptor the child writes responses to */
  tx: number;
  /** Descriptor the child reads commands from */
  rx: number;
}

export type LaunchMode =
  | { role: "ui" }
  | { role: "supervisor"; pipes: PipeDescriptors }
  | { role: "worker"; appId: number; pipes: PipeDescriptors };

export class CliArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliArgumentError";
  }
}

function parseFlagValue<T>(flag: string, value: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  // z.coerce turns "" into 0, which is never a value the caller meant
  const parsed = value.trim() === "" ? null : schema.safeParse(value);
  if (!parsed?.success) {
    throw new CliArgumentError(`Invalid value for ${flag}: ${value}`);
  }
  return parsed.data;
}

/**
 * Parses the arguments after the script path (process.argv.slice(2)).
 * Unrecognised arguments are ignored.
 */
export function parseCliArguments(argv: readonly string[]): LaunchMode {
  let isOrchestrator = false;
  let appId: number | null = null;
  let tx: number | null = null;
  let rx: number | null = null;

  for (const arg of argv) {
    if (arg === "--orchestrator") {
      isOrchestrator = true;
    } else if (arg.startsWith("--app=")) {
      appId = parseFlagValue("--app", arg.slice(6), AppIdArgSchema);
    } else if (arg.startsWith("--tx=")) {
      tx = parseFlagValue("--tx", arg.slice(5), DescriptorSchema);
    } else if (arg.startsWith("--rx=")) {
      rx = parseFlagValue("--rx", arg.slice(5), DescriptorSchema);
    }
  }

  if ((tx === null) !== (rx === null)) {
    throw new CliArgumentError("Invalid arguments, tx and rx must be provided together");
  }
  if (isOrchestrator && appId !== null) {
    throw new CliArgumentError("--orchestrator and --app are mutually exclusive");
  }

  if (!isOrchestrator && appId === null) return { role: "ui" };

  if (tx === null || rx === null) {
    throw new CliArgumentError(
      `${isOrchestrator ? "--orchestrator" : "--app"} requires --tx and --rx`,
    );
  }

  const pipes = { tx, rx };
  return appId === null
    ? { role: "supervisor", pipes }
    : { role: "worker", appId, pipes };
}
