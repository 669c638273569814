export { decoderForPath, decoderJson, decoderToml, decoderTryAll, decoderYaml } from './decoders';
export type { DecodedMap, FileDecoder } from './decoders';

export { findConfigFileOption, locateConfigFile } from './locate';
export type { ConfigFileLocation, LocateOptions } from './locate';

export { applyFileContent, applyFileMap, readConfigFile } from './resolver';
export type { ReadFileOptions } from './resolver';
