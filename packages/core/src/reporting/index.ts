export {
  formatDurationMs,
  formatUnknownError,
  serialiseError,
  writeJson,
  writeLine,
  type SerialisedError,
  type WritableTarget,
} from './formatting.js';
