import './register';

export { PostgreSQLDriver } from './driver/postgresql-driver';
export type { PostgreSQLDriverOptions } from './driver/postgresql-driver';
export { formatScriptError, parsePgError, quoteIdentifier } from './utils/pg-utils';
export type { PgErrorDetails } from './utils/pg-utils';
