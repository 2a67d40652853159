// Wire protocol shared by the UI process, the supervisor and every worker

export {
  ERROR_KINDS,
  ErrorKindSchema,
  UnlockdError,
  PipeClosedError,
  PipeTimeoutError,
  FrameTooLargeError,
  describeErrorKind,
  toErrorKind,
  type ErrorKind,
} from "./errors.js";

export {
  RawFrame,
  FrameReader,
  FrameWriter,
  FRAME_HEADER_BYTES,
  DEFAULT_MAX_FRAME_BYTES,
  type FramedChannel,
} from "./framing.js";

export {
  CommandSchema,
  encodeCommand,
  decodeCommand,
  encodeResponse,
  decodeResponse,
  success,
  failure,
  unwrap,
  isAppCommand,
  type Command,
  type CommandType,
  type AppCommand,
  type Response,
} from "./protocol.js";

export * from "./records.js";
