export { flagFromWord, parseFlagsToMap } from './parser';
export type { FlagValues, ParsedFlags, ParseFlagsOptions } from './parser';

export { applyFlags, lookupConfigFileFlag } from './resolver';
export type { ApplyFlagsOptions } from './resolver';
