import { DynamicModule, Module, Provider } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import * as fs from 'fs';
import * as path from 'path';

import { CafesController } from './cafes.controller';
import { CafesService } from './cafes.service';
import { CafeEntity } from './cafe.entity';
import type { CafeStoreKind } from './cafe.types';
import { CafeStore } from './stores/cafe-store';
import { SqlCafeStore } from './stores/sql-cafe.store';
import { TypeOrmCafeStore } from './stores/typeorm-cafe.store';

export type CafesModuleOptions = {
  store: CafeStoreKind;
  databasePath: string;
};

function ensureDir(p: string) {
  if (!fs.existsSync(p)) fs.mkdirSync(p, { recursive: true });
}

@Module({})
export class CafesModule {
  /** Wires the cafe routes onto one of the two table backends. */
  static register(options: CafesModuleOptions): DynamicModule {
    ensureDir(path.dirname(path.resolve(options.databasePath)));

    if (options.store === 'orm') {
      return {
        module: CafesModule,
        imports: [
          TypeOrmModule.forRoot({
            type: 'better-sqlite3',
            database: options.databasePath,
            entities: [CafeEntity],
            // the table is created from the same DDL the sql store uses
            synchronize: false,
          }),
          TypeOrmModule.forFeature([CafeEntity]),
        ],
        controllers: [CafesController],
        providers: [CafesService, { provide: CafeStore, useClass: TypeOrmCafeStore }],
      };
    }

    const store: Provider = {
      provide: CafeStore,
      useFactory: () => new SqlCafeStore(options.databasePath),
    };

    return {
      module: CafesModule,
      controllers: [CafesController],
      providers: [CafesService, store],
    };
  }
}
