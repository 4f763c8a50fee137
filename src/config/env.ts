import type { CafeStoreKind } from '../cafes/cafe.types';

export function parseCafeStoreKind(value: string): CafeStoreKind {
  if (value === 'sql' || value === 'orm') return value;
  throw new Error(`CAFE_STORE must be "sql" or "orm", got "${value}"`);
}

export default () => ({
  PORT: parseInt(process.env.PORT || '5000', 10),
  CAFE_STORE: parseCafeStoreKind(process.env.CAFE_STORE || 'sql'),
  DATABASE_PATH: process.env.DATABASE_PATH || 'instance/cafes.db',

  // the web front-end
  CORS_ORIGIN: process.env.CORS_ORIGIN || 'http://127.0.0.1:5001',
});
