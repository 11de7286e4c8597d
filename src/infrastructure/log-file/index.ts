export { SinkWriter } from './sink-writer.js';
export { defaultLogDirectory, logDirForPlatform, logFileName, openLogFile } from './log-location.js';
