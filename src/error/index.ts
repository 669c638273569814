export { ArgumentError } from './ArgumentError';
export { CoercionError } from './CoercionError';
export { ConfigurationError } from './ConfigurationError';
export type { ConfigurationErrorType } from './ConfigurationError';
export { DecodeError } from './DecodeError';
export { FileSystemError } from './FileSystemError';
export { FlagError } from './FlagError';
export { HelpRequestedError } from './HelpRequestedError';
export { StructureError } from './StructureError';
export type { StructureErrorType } from './StructureError';
