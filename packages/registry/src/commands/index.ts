export { runList } from './list.js';
export type { ListOptions } from './list.js';
export { runShow } from './show.js';
export { runSearch } from './search.js';
export { runConvert, CONVERSION_FORMATS } from './convert.js';
export type { ConvertOptions } from './convert.js';
export { runValidate } from './validate.js';
export { runCategories } from './categories.js';
export { runImport } from './import.js';
export type { ImportOptions } from './import.js';
export type { CommandIO, CommandContext, ExitCode } from './types.js';
