import { BadRequestException, NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';

import { cafeBlue, makeCafe } from '../../test/cafe.fixtures';
import { DuplicateCafeError, PersistenceError } from '../common/errors/persistence.error';
import { CafesService, CAFE_ADDED, CAFE_NOT_FOUND } from './cafes.service';
import type { Cafe, NewCafe } from './cafe.types';
import { CafeStore } from './stores/cafe-store';

class InMemoryCafeStore extends CafeStore {
  readonly rows: Cafe[] = [];

  async add(record: NewCafe) {
    const cafe = { id: this.rows.length + 1, ...record };
    this.rows.push(cafe);
    return cafe;
  }

  async listAll() {
    return [...this.rows];
  }

  async findByName(name: string) {
    return this.rows.find((c) => c.name === name) ?? null;
  }
}

describe('CafesService', () => {
  let service: CafesService;
  let store: InMemoryCafeStore;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [CafesService, { provide: CafeStore, useClass: InMemoryCafeStore }],
    }).compile();
    moduleRef.useLogger(false);

    service = moduleRef.get(CafesService);
    store = moduleRef.get<CafeStore, InMemoryCafeStore>(CafeStore);
  });

  it('adds a cafe and answers with the confirmation payload', async () => {
    await expect(service.addCafe(cafeBlue)).resolves.toEqual({
      response: { success: 'Successfully added the new cafe.' },
    });
    expect(CAFE_ADDED).toBe('Successfully added the new cafe.');
    expect(store.rows).toEqual([{ id: 1, ...cafeBlue }]);
  });

  it('stores null for the optional fields when they are left out', async () => {
    const { seats: _seats, coffee_price: _price, ...required } = makeCafe({ name: 'Bare' });

    await service.addCafe(required);

    expect(store.rows[0]).toMatchObject({ name: 'Bare', seats: null, coffee_price: null });
  });

  it('lists what the store holds', async () => {
    await service.addCafe(makeCafe({ name: 'A' }));
    await service.addCafe(makeCafe({ name: 'B' }));

    const names = (await service.listCafes()).map((c) => c.name);
    expect(names).toEqual(['A', 'B']);
  });

  it('returns the cafe with the given name', async () => {
    await service.addCafe(cafeBlue);
    await expect(service.getCafeByName('Cafe Blue')).resolves.toEqual({ id: 1, ...cafeBlue });
  });

  it('throws NotFoundException for an unknown name', async () => {
    const err = await service.getCafeByName('Nowhere').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NotFoundException);
    expect(err).toMatchObject({ message: CAFE_NOT_FOUND });
  });

  it('answers 400 when the table refuses a duplicate name', async () => {
    jest.spyOn(store, 'add').mockRejectedValue(new DuplicateCafeError());

    const err = await service.addCafe(cafeBlue).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BadRequestException);
    expect(err).toMatchObject({ message: 'Cafe with this name already exists' });
  });

  it('lets other storage failures through untouched', async () => {
    const failure = new PersistenceError('Failed to add cafe');
    jest.spyOn(store, 'add').mockRejectedValue(failure);

    await expect(service.addCafe(cafeBlue)).rejects.toBe(failure);
  });
});
