import { registerDriver } from '@tidemark/core';

import { MySQLDriver } from './driver/mysql-driver';

// Auto-register the MySQL driver
registerDriver('mysql', {
  create: () => new MySQLDriver(),
  accepts: (instance) => MySQLDriver.accepts(instance),
});

export { MySQLDriver };
