export const CAFE_TABLE = 'cafe';

// Shared by both stores so either one can open a file the other wrote.
export const CAFE_TABLE_DDL = `
  CREATE TABLE IF NOT EXISTS ${CAFE_TABLE} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name VARCHAR(250) NOT NULL,
    map_url VARCHAR(500) NOT NULL,
    img_url VARCHAR(500) NOT NULL,
    location VARCHAR(250) NOT NULL,
    has_sockets BOOLEAN NOT NULL,
    has_toilet BOOLEAN NOT NULL,
    has_wifi BOOLEAN NOT NULL,
    can_take_calls BOOLEAN NOT NULL,
    seats VARCHAR(250),
    coffee_price VARCHAR(250)
  )
`;
