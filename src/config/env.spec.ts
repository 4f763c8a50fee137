import envConfig, { parseCafeStoreKind } from './env';

describe('env config', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('uses the documented defaults', () => {
    delete process.env.PORT;
    delete process.env.CAFE_STORE;
    delete process.env.DATABASE_PATH;
    delete process.env.CORS_ORIGIN;

    expect(envConfig()).toEqual({
      PORT: 5000,
      CAFE_STORE: 'sql',
      DATABASE_PATH: 'instance/cafes.db',
      CORS_ORIGIN: 'http://127.0.0.1:5001',
    });
  });

  it('reads overrides from the environment', () => {
    process.env.PORT = '8080';
    process.env.CAFE_STORE = 'orm';
    process.env.DATABASE_PATH = '/tmp/other.db';

    expect(envConfig()).toMatchObject({ PORT: 8080, CAFE_STORE: 'orm', DATABASE_PATH: '/tmp/other.db' });
  });

  it('rejects an unknown store kind', () => {
    expect(parseCafeStoreKind('sql')).toBe('sql');
    expect(parseCafeStoreKind('orm')).toBe('orm');
    expect(() => parseCafeStoreKind('mongo')).toThrow('CAFE_STORE must be "sql" or "orm", got "mongo"');
  });
});
