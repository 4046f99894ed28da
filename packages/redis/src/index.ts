import './register';

export { RedisDriver } from './driver/redis-driver';
export type { RedisDriverOptions } from './driver/redis-driver';
export { RedisConnectionManager } from './connection/redis-connection';
export type { RedisConnectionConfig } from './connection/redis-connection';
export { ScriptParseError, parseScript, tokenize } from './script/script-parser';
export type { RedisCommand } from './script/script-parser';
