import type { BoxAssignment, BoxDefinition, Dimensions, Item, OversizedItem, PackOutcome } from '../types';
import { isDebug } from '../config';
import { PackingError } from '../errors';
import { type BoxCatalog, defaultCatalog } from './catalog';

function sortedTriple(length: number, width: number, height: number): [number, number, number] {
  const [a, b, c] = [length, width, height].sort((x, y) => x - y);
  return [a, b, c];
}

function volumeOf(dimensions: Dimensions): number {
  return dimensions.length * dimensions.width * dimensions.height;
}

function innerDimensions(box: BoxDefinition): Dimensions {
  return { length: box.length, width: box.width, height: box.height };
}

// Sorted triples cover all six axis-aligned orientations; equal edges fit.
export function fitsInBox(dimensions: Dimensions, box: BoxDefinition): boolean {
  const [i1, i2, i3] = sortedTriple(dimensions.length, dimensions.width, dimensions.height);
  const [b1, b2, b3] = sortedTriple(box.length, box.width, box.height);
  return i1 <= b1 && i2 <= b2 && i3 <= b3;
}

export function findOversizedItems(items: Item[], catalog: BoxCatalog = defaultCatalog): OversizedItem[] {
  const largest = catalog.largest();

  return items
    .filter(item => !fitsInBox(item.dimensions, largest))
    .map(item => ({
      sku: item.sku,
      dimensions: { ...item.dimensions },
      max_box_inner_dimensions: innerDimensions(largest),
    }));
}

// Each item is checked alone; combined volume is never checked.
export function findSmallestSingleBox(
  items: Item[],
  catalog: BoxCatalog = defaultCatalog,
): BoxDefinition | undefined {
  return catalog
    .listAscendingByVolume()
    .find(box => items.every(item => fitsInBox(item.dimensions, box)));
}

interface OpenBox {
  box: BoxDefinition;
  rank: number;
  opened: number;
  members: Array<{ item: Item; position: number }>;
}

// Boxes come back in opening order, skus inside a box in request order.
export function packIntoBoxes(items: Item[], catalog: BoxCatalog = defaultCatalog): BoxAssignment[] {
  const boxes = catalog.listAscendingByVolume();

  const queue = items
    .map((item, position) => ({ item, position, volume: volumeOf(item.dimensions) }))
    .sort((a, b) => b.volume - a.volume || a.position - b.position);

  const open: OpenBox[] = [];

  for (const entry of queue) {
    const candidates = [...open].sort((a, b) => a.rank - b.rank || a.opened - b.opened);
    const target = candidates.find(candidate => fitsInBox(entry.item.dimensions, candidate.box));

    if (target) {
      target.members.push({ item: entry.item, position: entry.position });
      continue;
    }

    const rank = boxes.findIndex(box => fitsInBox(entry.item.dimensions, box));
    if (rank < 0) {
      throw new PackingError(entry.item.sku);
    }

    open.push({
      box: boxes[rank],
      rank,
      opened: open.length,
      members: [{ item: entry.item, position: entry.position }],
    });

    if (isDebug) {
      console.log(`Opened ${boxes[rank].box_id} for ${entry.item.sku} (volume ${entry.volume})`);
    }
  }

  return open.map(({ box, members }) => ({
    box,
    items: [...members].sort((a, b) => a.position - b.position).map(member => member.item.sku),
  }));
}

export function pack(items: Item[], catalog: BoxCatalog = defaultCatalog): PackOutcome {
  if (items.length === 0) {
    return { ok: true, boxes: [] };
  }

  const oversized = findOversizedItems(items, catalog);
  if (oversized.length > 0) {
    if (isDebug) {
      console.log(`Rejected ${oversized.length} oversized item(s):`, oversized.map(o => o.sku));
    }
    return { ok: false, error: 'item_too_large', items: oversized };
  }

  const single = findSmallestSingleBox(items, catalog);
  if (single) {
    if (isDebug) {
      console.log(`Packed ${items.length} item(s) into a single ${single.box_id}`);
    }
    return { ok: true, boxes: [{ box: single, items: items.map(item => item.sku) }] };
  }

  try {
    const boxes = packIntoBoxes(items, catalog);

    if (isDebug) {
      console.log(`Packed ${items.length} item(s) into ${boxes.length} boxes:`);
      boxes.forEach((assignment, i) => {
        console.log(`  Box ${i + 1}: ${assignment.box.box_id} -> ${assignment.items.join(', ')}`);
      });
    }

    return { ok: true, boxes };
  } catch (error) {
    if (error instanceof PackingError) {
      return { ok: false, error: 'packing_error', message: error.message };
    }
    throw error;
  }
}
