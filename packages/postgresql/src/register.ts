import { registerDriver } from '@tidemark/core';

import { PostgreSQLDriver } from './driver/postgresql-driver';

import type { DriverFactory } from '@tidemark/core';

// Auto-register the PostgreSQL driver for both URL schemes
const factory: DriverFactory = {
  create: () => new PostgreSQLDriver(),
  accepts: (instance) => PostgreSQLDriver.accepts(instance),
};

registerDriver('postgres', factory);
registerDriver('postgresql', factory);

export { PostgreSQLDriver };
