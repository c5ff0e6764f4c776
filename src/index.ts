export { parseAddress, formatAddress, DEFAULT_ADDRESS } from "./connection/address.js";
export type { SocketAddress } from "./connection/address.js";
export { NetTransport, dialNet } from "./connection/transport.js";
export type { Transport, Dialer, DialOptions } from "./connection/transport.js";
export {
  Connection,
  END_MARKER,
  QUIT_MARKER,
  QUIT_COMMAND,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_QUIT_TIMEOUT_MS,
} from "./connection/connection.js";
export type { ConnectionOptions, SendOptions, CommandChannel } from "./connection/connection.js";
export { withSession } from "./connection/session.js";
export { withConnectionRecovery, sendWithRetry } from "./utils/connection-recovery.js";
export type { RecoveryOptions } from "./utils/connection-recovery.js";
export { InteractiveConsole, dispatchLine } from "./console/console.js";
export type { ConsoleOptions, ConsoleAction, ConsoleOutcome } from "./console/console.js";
export { completeCommand, parseCommandNames } from "./console/completion.js";
export { HistoryStore } from "./console/history.js";
export { runBatch, fileCommands } from "./console/batch.js";
export { lsqError, asError, isLsqError, isRetryable, errorLogFields } from "./errors.js";
export type { LsqError, LsqErrorKind } from "./errors.js";
export { Logger } from "./logger.js";
