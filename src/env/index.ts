export { makeEnvKey } from './naming';

export { readEnvVar, readPrefixedEnvVars } from './reader';

export { applyEnv, lookupConfigFileEnv } from './resolver';

export type { EnvOptions, EnvSource, EnvVarReadResult } from './types';
