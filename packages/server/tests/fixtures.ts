// Shared test data — a small made-up indicator table

import { createDataset, type Dataset } from '@indicator-dash/core';

export function testDataset(): Dataset {
  return createDataset([
    { country: 'Borduria', continent: 'Europe', year: 1997, lifeExp: 70, pop: 5000000, gdpPercap: 9000 },
    { country: 'Borduria', continent: 'Europe', year: 2002, lifeExp: 71, pop: 5100000, gdpPercap: 9500 },
    { country: 'Borduria', continent: 'Europe', year: 2007, lifeExp: 72.5, pop: 5200000, gdpPercap: 10200 },
    { country: 'Khemed', continent: 'Asia', year: 1997, lifeExp: 60, pop: 20000000, gdpPercap: 3000 },
    { country: 'Khemed', continent: 'Asia', year: 2002, lifeExp: 62, pop: 21000000, gdpPercap: 3300 },
    { country: 'Khemed', continent: 'Asia', year: 2007, lifeExp: 63, pop: 22500000, gdpPercap: 3900 },
    { country: 'San Theodoros', continent: 'Americas', year: 2007, lifeExp: 68, pop: 9000000, gdpPercap: 7000 },
  ]);
}
