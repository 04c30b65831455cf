import type { BoxDefinition, BoxRow } from '../types';
import { config } from '../config';
import { CatalogError } from '../errors';

export interface BoxCatalog {
  listAscendingByVolume(): readonly BoxDefinition[];
  largest(): BoxDefinition;
}

export function createCatalog(rows: readonly BoxRow[]): BoxCatalog {
  if (rows.length === 0) {
    throw new CatalogError('Box catalog must contain at least one box');
  }

  const seen = new Set<string>();
  for (const row of rows) {
    if (seen.has(row.box_id)) {
      throw new CatalogError(`Duplicate box id in catalog: ${row.box_id}`);
    }
    seen.add(row.box_id);
  }

  const boxes: readonly BoxDefinition[] = Object.freeze(
    rows
      .map(row => Object.freeze({ ...row, volume: row.length * row.width * row.height }))
      .sort((a, b) => {
        if (a.volume !== b.volume) return a.volume - b.volume;
        if (a.length !== b.length) return a.length - b.length;
        if (a.width !== b.width) return a.width - b.width;
        return a.height - b.height;
      }),
  );

  const largest = boxes[boxes.length - 1];

  return Object.freeze({
    listAscendingByVolume: () => boxes,
    largest: () => largest,
  });
}

export const defaultCatalog = createCatalog(config.boxes);
