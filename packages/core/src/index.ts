export {
  LogLevel,
  ProgressPhase,
  EventValidationError,
  createLogEvent,
  createProgressEvent,
  deriveLogEvent,
  levelName,
  renderMessage,
  stringifyMessage,
  type FxEvent,
  type LogEvent,
  type LogLevelValue,
  type ProgressEvent,
} from '@fxlog/shared';

export { EffectContext, createContext, type DispatchResult } from './dispatch/context.js';
export {
  consume,
  forward,
  ignore,
  onLog,
  onProgress,
  type EventHandler,
  type HandlerResult,
} from './dispatch/handler.js';
export { applyFallback, fallbackWarning } from './dispatch/fallback.js';

export { log, logDebug, logInfo, logWarning, logError } from './emit/log.js';
export { progressbar, progressbarAsync, type ProgressbarOptions } from './emit/progressbar.js';

export {
  TextWriter,
  openTextWriter,
  withTextWriter,
  type ActiveBar,
  type Destination,
  type TextWriterOptions,
} from './renderer/text-writer.js';
export { formatBar, formatDuration, formatLogLine } from './renderer/format.js';
export { RedrawScheduler } from './renderer/redraw-scheduler.js';
export { destinationOwner } from './renderer/ownership.js';

export { DestinationClosedError, DestinationInUseError } from './errors.js';
export { getConfig, loadConfig, resetConfig, type FxlogConfig } from './config/index.js';
export { createLogger } from './utils/logger.js';
