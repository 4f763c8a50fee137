import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { DuplicateCafeError } from '../common/errors/persistence.error';
import type { CreateCafeDto } from './dto/create-cafe.dto';
import type { Cafe } from './cafe.types';
import { CafeStore } from './stores/cafe-store';

export const CAFE_ADDED = 'Successfully added the new cafe.';
export const CAFE_NOT_FOUND = "Sorry, we don't have a cafe with that name.";

@Injectable()
export class CafesService {
  private readonly log = new Logger(CafesService.name);

  constructor(private readonly store: CafeStore) {}

  async addCafe(dto: CreateCafeDto) {
    let cafe: Cafe;
    try {
      cafe = await this.store.add({
        name: dto.name,
        map_url: dto.map_url,
        img_url: dto.img_url,
        location: dto.location,
        has_sockets: dto.has_sockets,
        has_toilet: dto.has_toilet,
        has_wifi: dto.has_wifi,
        can_take_calls: dto.can_take_calls,
        seats: dto.seats ?? null,
        coffee_price: dto.coffee_price ?? null,
      });
    } catch (err) {
      if (err instanceof DuplicateCafeError) throw new BadRequestException(err.message);
      throw err;
    }
    this.log.log(`Added cafe id=${cafe.id} name="${cafe.name}"`);

    return { response: { success: CAFE_ADDED } };
  }

  listCafes(): Promise<Cafe[]> {
    return this.store.listAll();
  }

  async getCafeByName(name: string): Promise<Cafe> {
    const cafe = await this.store.findByName(name);
    if (!cafe) throw new NotFoundException(CAFE_NOT_FOUND);
    return cafe;
  }
}
