import { Module } from '@nestjs/common';
import { CONNECTION_DRIVER_FACTORY } from '../common/interfaces/connection-driver.interface';
import { REDIS_EXECUTOR, RedisExecutor } from '../common/interfaces/redis-executor.interface';
import { ConfigModule } from '../config/config.module';
import { ValkeyDriverFactory } from '../driver/factory/valkey-driver.factory';
import { RedisClientFactory } from './redis-client.factory';

@Module({
  imports: [ConfigModule],
  providers: [
    { provide: CONNECTION_DRIVER_FACTORY, useClass: ValkeyDriverFactory },
    RedisClientFactory,
    {
      provide: REDIS_EXECUTOR,
      useFactory: async (factory: RedisClientFactory): Promise<RedisExecutor> => {
        const client = factory.create();
        return client.initialized;
      },
      inject: [RedisClientFactory],
    },
  ],
  exports: [REDIS_EXECUTOR],
})
export class RedisModule {}
