import { registerDriver } from '@tidemark/core';

import { RedisDriver } from './driver/redis-driver';

import type { DriverFactory } from '@tidemark/core';

// Auto-register the Redis driver for plain and TLS urls
const factory: DriverFactory = {
  create: () => new RedisDriver(),
  accepts: (instance) => RedisDriver.accepts(instance),
};

registerDriver('redis', factory);
registerDriver('rediss', factory);

export { RedisDriver };
