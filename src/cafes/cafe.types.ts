export type CafeStoreKind = 'sql' | 'orm';

export interface Cafe {
  id: number;
  name: string;
  map_url: string;
  img_url: string;
  location: string;
  has_sockets: boolean;
  has_toilet: boolean;
  has_wifi: boolean;
  can_take_calls: boolean;
  seats: string | null;
  coffee_price: string | null;
}

export type NewCafe = Omit<Cafe, 'id'>;
