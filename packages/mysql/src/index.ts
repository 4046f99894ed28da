import './register';

export { MySQLDriver } from './driver/mysql-driver';
export type { MySQLDriverOptions } from './driver/mysql-driver';
export { formatScriptError, isMySQLPool, parseMySQLError } from './utils/mysql-utils';
export type { MySQLErrorDetails } from './utils/mysql-utils';
