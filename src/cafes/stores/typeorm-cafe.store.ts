import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import {
  DuplicateCafeError,
  isUniqueViolation,
  PersistenceError,
} from '../../common/errors/persistence.error';
import { CafeEntity } from '../cafe.entity';
import { CAFE_TABLE, CAFE_TABLE_DDL } from '../cafe.table';
import type { Cafe, NewCafe } from '../cafe.types';
import { CafeStore } from './cafe-store';

function toCafe(e: CafeEntity): Cafe {
  return {
    id: e.id,
    name: e.name,
    map_url: e.map_url,
    img_url: e.img_url,
    location: e.location,
    has_sockets: e.has_sockets,
    has_toilet: e.has_toilet,
    has_wifi: e.has_wifi,
    can_take_calls: e.can_take_calls,
    seats: e.seats ?? null,
    coffee_price: e.coffee_price ?? null,
  };
}

@Injectable()
export class TypeOrmCafeStore extends CafeStore implements OnModuleInit {
  private readonly log = new Logger(TypeOrmCafeStore.name);

  constructor(@InjectRepository(CafeEntity) private readonly repo: Repository<CafeEntity>) {
    super();
  }

  async onModuleInit() {
    await this.attempt<unknown>('create table', () => this.repo.manager.query(CAFE_TABLE_DDL));
    this.log.log(`Table "${CAFE_TABLE}" ready`);
  }

  add(record: NewCafe): Promise<Cafe> {
    return this.attempt('add cafe', async () => {
      const saved = await this.repo.save(this.repo.create(record));
      return toCafe(saved);
    });
  }

  listAll(): Promise<Cafe[]> {
    return this.attempt('list cafes', async () => {
      const rows = await this.repo.find({ order: { id: 'ASC' } });
      return rows.map(toCafe);
    });
  }

  findByName(name: string): Promise<Cafe | null> {
    return this.attempt('find cafe', async () => {
      const row = await this.repo.findOne({ where: { name }, order: { id: 'ASC' } });
      return row ? toCafe(row) : null;
    });
  }

  private async attempt<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isUniqueViolation(err)) {
        this.log.warn(`Refused to ${action}: ${String(err)}`);
        throw new DuplicateCafeError({ cause: err });
      }
      this.log.error(`Failed to ${action}: ${String(err)}`);
      throw new PersistenceError(`Failed to ${action}`, { cause: err });
    }
  }
}
