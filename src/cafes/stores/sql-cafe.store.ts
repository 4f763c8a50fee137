import { Logger, OnModuleInit } from '@nestjs/common';
import Database from 'better-sqlite3';
import {
  DuplicateCafeError,
  isUniqueViolation,
  PersistenceError,
} from '../../common/errors/persistence.error';
import { CAFE_TABLE, CAFE_TABLE_DDL } from '../cafe.table';
import type { Cafe, NewCafe } from '../cafe.types';
import { CafeStore } from './cafe-store';

type CafeRow = {
  id: number;
  name: string;
  map_url: string;
  img_url: string;
  location: string;
  has_sockets: number;
  has_toilet: number;
  has_wifi: number;
  can_take_calls: number;
  seats: string | null;
  coffee_price: string | null;
};

// sqlite has no boolean type and better-sqlite3 refuses to bind JS booleans
type CafeParams = Omit<CafeRow, 'id'>;

function toParams(record: NewCafe): CafeParams {
  return {
    name: record.name,
    map_url: record.map_url,
    img_url: record.img_url,
    location: record.location,
    has_sockets: record.has_sockets ? 1 : 0,
    has_toilet: record.has_toilet ? 1 : 0,
    has_wifi: record.has_wifi ? 1 : 0,
    can_take_calls: record.can_take_calls ? 1 : 0,
    seats: record.seats,
    coffee_price: record.coffee_price,
  };
}

function toCafe(row: CafeRow): Cafe {
  return {
    id: row.id,
    name: row.name,
    map_url: row.map_url,
    img_url: row.img_url,
    location: row.location,
    has_sockets: row.has_sockets === 1,
    has_toilet: row.has_toilet === 1,
    has_wifi: row.has_wifi === 1,
    can_take_calls: row.can_take_calls === 1,
    seats: row.seats,
    coffee_price: row.coffee_price,
  };
}

const INSERT_SQL = `
  INSERT INTO ${CAFE_TABLE}
    (name, map_url, img_url, location, has_sockets, has_toilet, has_wifi, can_take_calls, seats, coffee_price)
  VALUES
    (@name, @map_url, @img_url, @location, @has_sockets, @has_toilet, @has_wifi, @can_take_calls, @seats, @coffee_price)
`;

/**
 * Cafe store over raw SQL statements. Every operation opens its own
 * connection and closes it before returning, whether it succeeded or not.
 */
export class SqlCafeStore extends CafeStore implements OnModuleInit {
  private readonly log = new Logger(SqlCafeStore.name);

  constructor(private readonly databasePath: string) {
    super();
  }

  onModuleInit() {
    this.withConnection('create table', (db) => db.exec(CAFE_TABLE_DDL));
    this.log.log(`Table "${CAFE_TABLE}" ready in ${this.databasePath}`);
  }

  async add(record: NewCafe): Promise<Cafe> {
    return this.withConnection('add cafe', (db) => {
      const { lastInsertRowid } = db.prepare<CafeParams>(INSERT_SQL).run(toParams(record));
      const row = db
        .prepare<[number], CafeRow>(`SELECT * FROM ${CAFE_TABLE} WHERE id = ?`)
        .get(Number(lastInsertRowid));
      if (!row) throw new Error(`Row ${lastInsertRowid} vanished after insert`);
      return toCafe(row);
    });
  }

  async listAll(): Promise<Cafe[]> {
    return this.withConnection('list cafes', (db) =>
      db.prepare<[], CafeRow>(`SELECT * FROM ${CAFE_TABLE} ORDER BY id`).all().map(toCafe),
    );
  }

  async findByName(name: string): Promise<Cafe | null> {
    return this.withConnection('find cafe', (db) => {
      const row = db
        .prepare<[string], CafeRow>(`SELECT * FROM ${CAFE_TABLE} WHERE name = ? ORDER BY id LIMIT 1`)
        .get(name);
      return row ? toCafe(row) : null;
    });
  }

  private withConnection<T>(action: string, fn: (db: Database.Database) => T): T {
    let db: Database.Database | undefined;
    try {
      db = new Database(this.databasePath);
      return fn(db);
    } catch (err) {
      if (isUniqueViolation(err)) {
        this.log.warn(`Refused to ${action}: ${String(err)}`);
        throw new DuplicateCafeError({ cause: err });
      }
      this.log.error(`Failed to ${action}: ${String(err)}`);
      throw new PersistenceError(`Failed to ${action}`, { cause: err });
    } finally {
      db?.close();
    }
  }
}
