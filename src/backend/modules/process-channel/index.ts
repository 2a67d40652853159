export {
  parseCliArguments,
  CliArgumentError,
  type LaunchMode,
  type PipeDescriptors,
} from "./arguments.js";

export {
  spawnChild,
  openParentChannel,
  selfCommand,
  ChildExitTimeoutError,
  CHILD_TX_FD,
  CHILD_RX_FD,
  type ChildHandle,
  type SelfCommand,
  type SpawnChildOptions,
} from "./channel.js";
