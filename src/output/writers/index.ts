export { FileWriter, DEFAULT_FILE_PATTERN } from './FileWriter';
export type { FileWriterOptions } from './FileWriter';
export { StreamWriter, stdoutWriter, stderrWriter } from './StreamWriter';
export { MultiWriter, MultiWriteError } from './MultiWriter';
export { writerFunc } from './writerFunc';
