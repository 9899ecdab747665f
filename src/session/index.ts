export { ProcessSession, type SessionDependencies } from './session.js';
export { TransactionFramer, escapeRegExp } from './framer.js';
export { classifyErrors, extractResponse, isFailure, type ErrorClassification } from './response.js';
export { stripControlSequences, escapeForDisplay } from './escape.js';
export { spawnPtyChannel, resolveExecutable } from './pty-channel.js';
export type { ChannelExit, ChannelFactory, ChannelSpawnSpec, Disposable, EngineChannel } from './channel.js';
export type * from './types.js';
