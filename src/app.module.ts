import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import envConfig from './config/env';

import { CafesModule } from './cafes/cafes.module';

// forRoot loads .env into process.env, so it has to run before envConfig()
const configModule = ConfigModule.forRoot({
  isGlobal: true,
  load: [envConfig],
});

// the backend is fixed for the process lifetime, so it is read while the
// module graph is built rather than through ConfigService
const env = envConfig();

@Module({
  imports: [
    configModule,
    CafesModule.register({
      store: env.CAFE_STORE,
      databasePath: env.DATABASE_PATH,
    }),
  ],
})
export class AppModule {}
